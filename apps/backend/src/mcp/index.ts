#!/usr/bin/env -S npx tsx
import "dotenv/config";

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createShopifyTools } from "../tools";
import { createShopifyClient } from "../utils/shopify/client";
import { loadShopifyConfig } from "../utils/shopify/config";

import { createShopifyMcpServer } from "./server";

// stdout carries the MCP protocol; every log line goes to stderr.
async function main() {
  const config = loadShopifyConfig();
  const client = createShopifyClient(config);
  const tools = createShopifyTools(client);
  const server = createShopifyMcpServer(tools);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `[Shopify MCP] Serving ${tools.length} tools for ${config.storeDomain} (API ${config.apiVersion})`
  );
}

main().catch((error) => {
  console.error("[Shopify MCP] Failed to start:", error);
  process.exit(1);
});
