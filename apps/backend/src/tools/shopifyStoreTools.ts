import { z } from "zod";

import type { ShopifyGraphqlClient } from "../utils/shopify/client";
import {
  getLocations,
  getPublications,
  getShopInfo,
  isProductPublished,
  publishProduct,
} from "../utils/shopify/store";

import {
  defineShopifyTool,
  respond,
  toJson,
  type ShopifyTool,
} from "./shopifyTool";

const publicationInput = z
  .object({
    productId: z.string().min(1),
    publicationId: z
      .string()
      .min(1)
      .describe("Publication GID from get_publications"),
  })
  .strict();

export function createShopifyStoreTools(
  client: ShopifyGraphqlClient
): ShopifyTool[] {
  return [
    defineShopifyTool({
      name: "get_shop_info",
      description:
        "Gets the shop's name, domains, contact email, currency and timezone.",
      inputSchema: z.object({}).strict(),
      run: async () => respond(await getShopInfo(client), toJson),
    }),
    defineShopifyTool({
      name: "get_locations",
      description: "Lists the store's inventory locations with addresses.",
      inputSchema: z
        .object({ first: z.number().int().min(1).max(250).default(50) })
        .strict(),
      run: async ({ first }) =>
        respond(await getLocations(client, { first }), toJson),
    }),
    defineShopifyTool({
      name: "get_publications",
      description:
        "Lists sales channel publications. Use a publication ID to publish products.",
      inputSchema: z.object({}).strict(),
      run: async () => respond(await getPublications(client), toJson),
    }),
    defineShopifyTool({
      name: "publish_product",
      description: "Publishes a product to a sales channel publication.",
      inputSchema: publicationInput,
      run: async (args) => respond(await publishProduct(client, args), toJson),
    }),
    defineShopifyTool({
      name: "is_product_published",
      description:
        "Checks whether a product is published to a given publication.",
      inputSchema: publicationInput,
      run: async (args) =>
        respond(await isProductPublished(client, args), toJson),
    }),
  ];
}
