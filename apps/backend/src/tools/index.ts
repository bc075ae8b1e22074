import { tool, type ToolSet } from "ai";

import type { ShopifyGraphqlClient } from "../utils/shopify/client";

import { createShopifyCatalogTools } from "./shopifyCatalogTools";
import { createShopifyCommerceTools } from "./shopifyCommerceTools";
import { createShopifyContentTools } from "./shopifyContentTools";
import { createShopifyNavigationTools } from "./shopifyNavigationTools";
import { createShopifyStoreTools } from "./shopifyStoreTools";
import type { ShopifyTool } from "./shopifyTool";

export type { ShopifyTool, ShopifyToolResponse } from "./shopifyTool";

/**
 * Every Shopify tool bound to one client. Names are unique across the list.
 */
export function createShopifyTools(client: ShopifyGraphqlClient): ShopifyTool[] {
  return [
    ...createShopifyCatalogTools(client),
    ...createShopifyContentTools(client),
    ...createShopifyNavigationTools(client),
    ...createShopifyCommerceTools(client),
    ...createShopifyStoreTools(client),
  ];
}

/**
 * Expose the tools to an AI SDK agent. The agent receives the rendered text
 * only. Failures start with "Error", except not-found lookups, which read
 * like "Blog not found for ID: ...".
 */
export function toAiSdkTools(tools: readonly ShopifyTool[]): ToolSet {
  const toolSet: ToolSet = {};
  for (const shopifyTool of tools) {
    toolSet[shopifyTool.name] = tool({
      description: shopifyTool.description,
      inputSchema: shopifyTool.inputSchema,
      execute: async (args: unknown) => {
        const response = await shopifyTool.execute(args);
        return response.text;
      },
    });
  }
  return toolSet;
}
