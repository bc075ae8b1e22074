const SHOPIFY_DOMAIN_PATTERN = /^[a-z0-9][a-z0-9-]*\.myshopify\.com$/i;

export function normalizeShopifyShopDomain(input: string): string {
  const trimmed = input.trim().toLowerCase();
  const withoutProtocol = trimmed.replace(/^https?:\/\//, "");
  const withoutPath = withoutProtocol.split("/")[0] || "";
  return withoutPath;
}

export function assertValidShopifyShopDomain(input: string): string {
  const normalized = normalizeShopifyShopDomain(input);
  if (!normalized || !SHOPIFY_DOMAIN_PATTERN.test(normalized)) {
    throw new Error(
      "SHOPIFY_STORE_DOMAIN must be a valid Shopify domain like my-store.myshopify.com"
    );
  }
  return normalized;
}

/**
 * Last path segment of a global ID, for display only
 * (gid://shopify/InventoryItem/42 -> 42).
 */
export function trimShopifyGid(id: string): string {
  const segments = id.split("/");
  return segments[segments.length - 1] || id;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
