import type { ShopifyConfig } from "./config";
import {
  getShopifyDispatchErrorData,
  shopifyDecodeError,
  shopifyResponseError,
  shopifyTimeoutError,
  shopifyTransportError,
} from "./errors";
import type { ShopifyGraphqlResponse, ShopifyVariables } from "./types";
import { isRecord } from "./utils";

const DEFAULT_REQUEST_TIMEOUT_MS = 30000; // 30 seconds

export interface ShopifyGraphqlClient {
  /**
   * POST one query and return the parsed envelope as-is. Top-level `errors`
   * are left to the caller.
   */
  request<TData>(
    query: string,
    variables?: ShopifyVariables
  ): Promise<ShopifyGraphqlResponse<TData>>;
}

export interface ShopifyClientOptions {
  requestTimeoutMs?: number;
}

export function buildShopifyGraphqlEndpoint(config: ShopifyConfig): string {
  return `https://${config.storeDomain}/admin/api/${config.apiVersion}/graphql.json`;
}

export function createShopifyClient(
  config: ShopifyConfig,
  options: ShopifyClientOptions = {}
): ShopifyGraphqlClient {
  const endpoint = buildShopifyGraphqlEndpoint(config);
  const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  return {
    async request<TData>(query: string, variables?: ShopifyVariables) {
      if (!query.trim()) {
        throw new Error("GraphQL query must be a non-empty string");
      }

      const payload: { query: string; variables?: ShopifyVariables } = {
        query,
      };
      if (variables && Object.keys(variables).length > 0) {
        payload.variables = variables;
      }

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), requestTimeoutMs);

      try {
        const response = await fetch(endpoint, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json",
            "X-Shopify-Access-Token": config.accessToken,
          },
          body: JSON.stringify(payload),
          signal: controller.signal,
        });

        const body = await response.text();

        if (!response.ok) {
          throw shopifyResponseError(
            response.status,
            response.statusText,
            body
          );
        }

        return parseShopifyEnvelope<TData>(body);
      } catch (error) {
        if (getShopifyDispatchErrorData(error)) {
          throw error;
        }
        if (error instanceof Error && error.name === "AbortError") {
          throw shopifyTimeoutError(requestTimeoutMs, error);
        }
        throw shopifyTransportError(
          `Shopify API request failed: ${
            error instanceof Error ? error.message : String(error)
          }`,
          error
        );
      } finally {
        clearTimeout(timeoutId);
      }
    },
  };
}

function parseShopifyEnvelope<TData>(
  body: string
): ShopifyGraphqlResponse<TData> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw shopifyDecodeError(
      "Shopify API returned a response that is not valid JSON",
      body,
      error
    );
  }

  if (!isRecord(parsed)) {
    throw shopifyDecodeError(
      "Shopify API returned JSON that is not a GraphQL response object",
      body
    );
  }

  return parsed as ShopifyGraphqlResponse<TData>;
}
