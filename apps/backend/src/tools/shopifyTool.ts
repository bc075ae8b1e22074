import { z } from "zod";

import { formatShopifyError } from "../utils/shopify/format";
import type { ShopifyOperationResult } from "../utils/shopify/operation";

import { validateToolArgs } from "./toolValidation";

export interface ShopifyToolResponse {
  text: string;
  isError: boolean;
}

/**
 * A tool with its argument type erased, so tools of every shape can share
 * one registry. `execute` validates raw arguments against `inputSchema`
 * before anything reaches Shopify.
 */
export interface ShopifyTool {
  name: string;
  description: string;
  inputSchema: z.ZodObject;
  execute: (args: unknown) => Promise<ShopifyToolResponse>;
}

/** Page size argument for listing tools */
export const firstNSchema = (fallback: number) =>
  z
    .number()
    .int()
    .min(1)
    .max(250)
    .default(fallback)
    .describe(`Number of records to return (default: ${fallback})`);

export interface ShopifyToolDefinition<TSchema extends z.ZodObject> {
  name: string;
  description: string;
  inputSchema: TSchema;
  run: (args: z.output<TSchema>) => Promise<ShopifyToolResponse>;
}

export function defineShopifyTool<TSchema extends z.ZodObject>(
  definition: ShopifyToolDefinition<TSchema>
): ShopifyTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    execute: async (args: unknown) => {
      const parsed = validateToolArgs(definition.inputSchema, args);
      if (!parsed.ok) {
        return { text: parsed.error, isError: true };
      }
      try {
        return await definition.run(parsed.data);
      } catch (error) {
        console.error(`[Shopify] Error in ${definition.name} tool:`, error);
        return {
          text: `Error running ${definition.name}: ${
            error instanceof Error ? error.message : String(error)
          }`,
          isError: true,
        };
      }
    },
  };
}

export function respond<T>(
  result: ShopifyOperationResult<T>,
  render: (data: T) => string
): ShopifyToolResponse {
  if (!result.ok) {
    return { text: formatShopifyError(result.error), isError: true };
  }
  return { text: render(result.data), isError: false };
}

export const toJson = (data: unknown): string => JSON.stringify(data, null, 2);

export const toolError = (text: string): ShopifyToolResponse => ({
  text,
  isError: true,
});
