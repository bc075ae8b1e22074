import { z } from "zod";

import { assertValidShopifyShopDomain } from "./utils";

export const DEFAULT_SHOPIFY_API_VERSION = "2025-01";

export interface ShopifyConfig {
  storeDomain: string;
  accessToken: string;
  apiVersion: string;
}

const shopifyEnvSchema = z.object({
  SHOPIFY_STORE_DOMAIN: z
    .string({ error: "SHOPIFY_STORE_DOMAIN is required" })
    .min(1, "SHOPIFY_STORE_DOMAIN is required"),
  SHOPIFY_ACCESS_TOKEN: z
    .string({ error: "SHOPIFY_ACCESS_TOKEN is required" })
    .min(1, "SHOPIFY_ACCESS_TOKEN is required"),
  SHOPIFY_API_VERSION: z
    .string()
    .regex(
      /^(\d{4}-\d{2}|unstable)$/,
      "SHOPIFY_API_VERSION must look like 2025-01 or be 'unstable'"
    )
    .default(DEFAULT_SHOPIFY_API_VERSION),
});

/**
 * Read the store domain, access token and API version from the environment.
 * Throws with every problem listed when the environment is incomplete.
 */
export function loadShopifyConfig(
  env: Record<string, string | undefined> = process.env
): ShopifyConfig {
  const parsed = shopifyEnvSchema.safeParse({
    SHOPIFY_STORE_DOMAIN: env.SHOPIFY_STORE_DOMAIN,
    SHOPIFY_ACCESS_TOKEN: env.SHOPIFY_ACCESS_TOKEN,
    SHOPIFY_API_VERSION: env.SHOPIFY_API_VERSION || undefined,
  });

  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => issue.message);
    throw new Error(`Invalid Shopify configuration: ${messages.join("; ")}`);
  }

  return {
    storeDomain: assertValidShopifyShopDomain(parsed.data.SHOPIFY_STORE_DOMAIN),
    accessToken: parsed.data.SHOPIFY_ACCESS_TOKEN.trim(),
    apiVersion: parsed.data.SHOPIFY_API_VERSION,
  };
}
