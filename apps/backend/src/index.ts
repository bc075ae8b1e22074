export { createShopifyMcpServer, toToolInputSchema } from "./mcp/server";
export type { ShopifyMcpServerOptions } from "./mcp/server";
export { createShopifyTools, toAiSdkTools } from "./tools";
export type { ShopifyTool, ShopifyToolResponse } from "./tools";
export { defineShopifyTool } from "./tools/shopifyTool";
export { validateToolArgs } from "./tools/toolValidation";

export * from "./utils/shopify/articles";
export * from "./utils/shopify/blogs";
export * from "./utils/shopify/client";
export * from "./utils/shopify/config";
export * from "./utils/shopify/customers";
export * from "./utils/shopify/discountCodes";
export * from "./utils/shopify/errors";
export * from "./utils/shopify/format";
export * from "./utils/shopify/inventory";
export * from "./utils/shopify/menus";
export * from "./utils/shopify/operation";
export * from "./utils/shopify/orders";
export * from "./utils/shopify/pages";
export * from "./utils/shopify/products";
export * from "./utils/shopify/store";
export * from "./utils/shopify/types";
