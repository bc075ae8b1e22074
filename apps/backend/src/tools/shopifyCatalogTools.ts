import { z } from "zod";

import type { ShopifyGraphqlClient } from "../utils/shopify/client";
import { formatInventoryItems, formatProduct, formatProducts } from "../utils/shopify/format";
import { getInventoryItems } from "../utils/shopify/inventory";
import {
  createProduct,
  createProductVariants,
  deleteProduct,
  getProduct,
  getProducts,
  updateProduct,
} from "../utils/shopify/products";

import {
  defineShopifyTool,
  firstNSchema,
  respond,
  type ShopifyTool,
} from "./shopifyTool";

const productStatusSchema = z.enum(["ACTIVE", "ARCHIVED", "DRAFT"]);

// Metafield and media inputs stay open; Shopify validates their contents.
const payloadSchema = z.record(z.string(), z.unknown());

const productOptionSchema = z
  .object({
    name: z.string().min(1).describe("Option name, e.g. Size"),
    values: z
      .array(z.union([z.string(), z.object({ name: z.string() }).strict()]))
      .optional()
      .describe("Option values; plain strings are accepted"),
    position: z.number().int().min(1).optional(),
  })
  .strict();

const productFieldsSchema = {
  descriptionHtml: z.string().optional(),
  handle: z.string().optional(),
  productType: z.string().optional(),
  vendor: z.string().optional(),
  status: productStatusSchema.optional(),
  tags: z.array(z.string()).optional(),
  metafields: z.array(payloadSchema).optional(),
};

const productCreateSchema = z.looseObject({
  title: z.string().min(1),
  ...productFieldsSchema,
  productOptions: z.array(productOptionSchema).optional(),
});

const productUpdateSchema = z.looseObject({
  id: z.string().min(1).describe("Product GID to update"),
  title: z.string().optional(),
  ...productFieldsSchema,
});

const moneySchema = z.union([z.string(), z.number()]);

const variantSchema = z.looseObject({
  price: moneySchema.optional(),
  compareAtPrice: moneySchema.optional(),
  optionValues: z
    .array(
      z
        .object({
          name: z.string(),
          optionId: z.string().optional(),
          optionName: z.string().optional(),
        })
        .strict()
    )
    .optional(),
  inventoryQuantities: z
    .array(
      z
        .object({
          availableQuantity: z.number().int(),
          locationId: z.string().min(1),
        })
        .strict()
    )
    .optional(),
  inventoryItem: z
    .object({
      sku: z.string().optional(),
      tracked: z.boolean().optional(),
    })
    .strict()
    .optional(),
  barcode: z.string().optional(),
  taxable: z.boolean().optional(),
  inventoryPolicy: z.enum(["DENY", "CONTINUE"]).optional(),
  metafields: z.array(payloadSchema).optional(),
});

export function createShopifyCatalogTools(
  client: ShopifyGraphqlClient
): ShopifyTool[] {
  return [
    defineShopifyTool({
      name: "get_products",
      description:
        "Lists the first products in the store with status, inventory and variant pricing.",
      inputSchema: z.object({ firstN: firstNSchema(3) }).strict(),
      run: async ({ firstN }) =>
        respond(await getProducts(client, { first: firstN }), formatProducts),
    }),
    defineShopifyTool({
      name: "get_product",
      description:
        "Gets a product by GID, including its description HTML and metafields.",
      inputSchema: z
        .object({
          productId: z
            .string()
            .min(1)
            .describe("Product GID, e.g. gid://shopify/Product/123"),
        })
        .strict(),
      run: async ({ productId }) =>
        respond(await getProduct(client, productId), formatProduct),
    }),
    defineShopifyTool({
      name: "create_product",
      description:
        "Creates a product with optional options, metafields and media.",
      inputSchema: z
        .object({
          product: productCreateSchema,
          media: z.array(payloadSchema).optional(),
        })
        .strict(),
      run: async ({ product, media }) =>
        respond(
          await createProduct(client, { product, media }),
          (created) => `Created product ${created.title} (ID: ${created.id})`
        ),
    }),
    defineShopifyTool({
      name: "update_product",
      description:
        "Updates a product's fields and optionally attaches new media.",
      inputSchema: z
        .object({
          product: productUpdateSchema,
          media: z.array(payloadSchema).optional(),
        })
        .strict(),
      run: async ({ product, media }) =>
        respond(await updateProduct(client, { product, media }), (updated) => {
          const lines = [`Updated product ${updated.title} (ID: ${updated.id})`];
          if (updated.media.length > 0) {
            lines.push(
              "Media:",
              ...updated.media.map(
                (item) =>
                  `- ${item.mediaContentType} ${item.alt ?? ""} (${
                    item.previewStatus ?? "UNKNOWN"
                  })`
              )
            );
          }
          return lines.join("\n");
        }),
    }),
    defineShopifyTool({
      name: "delete_product",
      description: "Deletes a product by GID.",
      inputSchema: z
        .object({
          productId: z.string().min(1),
          synchronous: z
            .boolean()
            .default(true)
            .describe("Wait for the deletion to finish (default: true)"),
        })
        .strict(),
      run: async ({ productId, synchronous }) =>
        respond(
          await deleteProduct(client, { productId, synchronous }),
          (deleted) => `Deleted product ${deleted.deletedProductId ?? productId}`
        ),
    }),
    defineShopifyTool({
      name: "create_product_variants",
      description:
        "Creates variants on an existing product in one bulk request.",
      inputSchema: z
        .object({
          productId: z.string().min(1),
          variants: z.array(variantSchema).min(1),
          media: z.array(payloadSchema).optional(),
          strategy: z
            .enum([
              "DEFAULT",
              "REMOVE_STANDALONE_VARIANT",
              "PRESERVE_STANDALONE_VARIANT",
            ])
            .optional(),
        })
        .strict(),
      run: async (args) =>
        respond(
          await createProductVariants(client, args),
          (ids) => `Created ${ids.length} variant(s):\n${ids.join("\n")}`
        ),
    }),
    defineShopifyTool({
      name: "get_inventory_items",
      description:
        "Lists inventory items with SKU, tracking and available stock.",
      inputSchema: z.object({ firstN: firstNSchema(5) }).strict(),
      run: async ({ firstN }) =>
        respond(
          await getInventoryItems(client, { first: firstN }),
          formatInventoryItems
        ),
    }),
  ];
}
