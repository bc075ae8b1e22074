import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { ShopifyTool } from "../tools";
import { isRecord } from "../utils/shopify/utils";

export interface ShopifyMcpServerOptions {
  name?: string;
  version?: string;
}

/**
 * JSON Schema for a tool's arguments, as clients will send them (defaults
 * make a field optional).
 */
export function toToolInputSchema(schema: z.ZodObject) {
  const jsonSchema = z.toJSONSchema(schema, {
    io: "input",
    unrepresentable: "any",
  });
  const properties: Record<string, Record<string, unknown>> = {};
  for (const [key, value] of Object.entries(jsonSchema.properties ?? {})) {
    properties[key] = isRecord(value) ? value : {};
  }
  return { ...jsonSchema, type: "object" as const, properties };
}

export function createShopifyMcpServer(
  tools: readonly ShopifyTool[],
  options: ShopifyMcpServerOptions = {}
): Server {
  const toolsByName = new Map(tools.map((tool) => [tool.name, tool]));

  const server = new Server(
    {
      name: options.name ?? "shopify-admin",
      version: options.version ?? "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toToolInputSchema(tool.inputSchema),
    })),
  }));

  server.setRequestHandler(
    CallToolRequestSchema,
    async (request): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;
      const tool = toolsByName.get(name);
      if (!tool) {
        console.warn(`[Shopify MCP] Unknown tool requested: ${name}`);
        return {
          content: [{ type: "text", text: `Error: Unknown tool: ${name}` }],
          isError: true,
        };
      }

      const response = await tool.execute(args ?? {});
      return {
        content: [{ type: "text", text: response.text }],
        isError: response.isError,
      };
    }
  );

  return server;
}
