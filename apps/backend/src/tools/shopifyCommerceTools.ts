import { z } from "zod";

import type { ShopifyGraphqlClient } from "../utils/shopify/client";
import {
  countCustomers,
  getCustomer,
  listCustomers,
  sendCustomerInvite,
} from "../utils/shopify/customers";
import {
  deleteDiscountCode,
  getDiscountCode,
  listDiscountCodes,
} from "../utils/shopify/discountCodes";
import { countOrders, listOrders } from "../utils/shopify/orders";

import {
  defineShopifyTool,
  respond,
  toJson,
  type ShopifyTool,
} from "./shopifyTool";

const first = z
  .number()
  .int()
  .min(1)
  .max(250)
  .default(10)
  .describe("Number of records to return (default: 10, max: 250)");

const after = z
  .string()
  .optional()
  .describe("Pagination cursor. Use pageInfo.endCursor from a previous response.");

const searchQuery = z
  .string()
  .optional()
  .describe("Shopify search syntax, e.g. email:alice@example.com");

const countLimit = z
  .number()
  .int()
  .min(1)
  .default(10000)
  .describe("Stop counting at this number (default: 10000)");

export function createShopifyCommerceTools(
  client: ShopifyGraphqlClient
): ShopifyTool[] {
  return [
    defineShopifyTool({
      name: "list_customers",
      description:
        "Lists customers with contact details, order count and amount spent.",
      inputSchema: z
        .object({
          first,
          after,
          query: searchQuery,
          sortKey: z
            .enum(["CREATED_AT", "ID", "LOCATION", "NAME", "RELEVANCE", "UPDATED_AT"])
            .optional(),
        })
        .strict(),
      run: async (args) => respond(await listCustomers(client, args), toJson),
    }),
    defineShopifyTool({
      name: "count_customers",
      description: "Counts customers, optionally filtered by a search query.",
      inputSchema: z.object({ query: searchQuery, limit: countLimit }).strict(),
      run: async (args) => respond(await countCustomers(client, args), toJson),
    }),
    defineShopifyTool({
      name: "get_customer",
      description: "Gets a customer by GID.",
      inputSchema: z
        .object({
          customerId: z
            .string()
            .min(1)
            .describe("Customer GID, e.g. gid://shopify/Customer/123"),
        })
        .strict(),
      run: async ({ customerId }) =>
        respond(await getCustomer(client, customerId), toJson),
    }),
    defineShopifyTool({
      name: "send_customer_invite",
      description: "Sends a customer an account invite email.",
      inputSchema: z.object({ customerId: z.string().min(1) }).strict(),
      run: async ({ customerId }) =>
        respond(
          await sendCustomerInvite(client, customerId),
          (sent) => `Invite sent to customer ${sent.customerId}`
        ),
    }),
    defineShopifyTool({
      name: "list_orders",
      description:
        "Lists orders with totals, customer and the first line items.",
      inputSchema: z
        .object({
          first,
          after,
          query: searchQuery,
          sortKey: z
            .enum([
              "CREATED_AT",
              "CUSTOMER_NAME",
              "FINANCIAL_STATUS",
              "FULFILLMENT_STATUS",
              "ID",
              "ORDER_NUMBER",
              "PROCESSED_AT",
              "RELEVANCE",
              "TOTAL_PRICE",
              "UPDATED_AT",
            ])
            .optional(),
        })
        .strict(),
      run: async (args) => respond(await listOrders(client, args), toJson),
    }),
    defineShopifyTool({
      name: "count_orders",
      description: "Counts orders, optionally filtered by a search query.",
      inputSchema: z.object({ query: searchQuery, limit: countLimit }).strict(),
      run: async (args) => respond(await countOrders(client, args), toJson),
    }),
    defineShopifyTool({
      name: "list_discount_codes",
      description: "Lists code discounts with their titles and summaries.",
      inputSchema: z.object({ first, after, query: searchQuery }).strict(),
      run: async (args) =>
        respond(await listDiscountCodes(client, args), toJson),
    }),
    defineShopifyTool({
      name: "get_discount_code",
      description: "Gets a code discount by its discount node GID.",
      inputSchema: z
        .object({
          discountId: z
            .string()
            .min(1)
            .describe("Discount GID, e.g. gid://shopify/DiscountCodeNode/123"),
        })
        .strict(),
      run: async ({ discountId }) =>
        respond(await getDiscountCode(client, discountId), toJson),
    }),
    defineShopifyTool({
      name: "delete_discount_code",
      description: "Deletes a code discount.",
      inputSchema: z.object({ discountId: z.string().min(1) }).strict(),
      run: async ({ discountId }) =>
        respond(
          await deleteDiscountCode(client, discountId),
          (deleted) =>
            `Deleted discount code ${deleted.deletedCodeDiscountId ?? discountId}`
        ),
    }),
  ];
}
