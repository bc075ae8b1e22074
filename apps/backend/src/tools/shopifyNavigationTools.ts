import { z } from "zod";

import type { ShopifyGraphqlClient } from "../utils/shopify/client";
import { formatMenu } from "../utils/shopify/format";
import { getMenu, updateMenu } from "../utils/shopify/menus";
import { MENU_ITEM_TYPES } from "../utils/shopify/types";

import { defineShopifyTool, respond, type ShopifyTool } from "./shopifyTool";

// Built with strictObject: .strict() clones the shape and would read the
// recursive getter before menuItemSchema exists.
const menuItemSchema = z.strictObject({
  id: z
    .string()
    .optional()
    .describe("Existing menu item GID; omit to create a new item"),
  title: z.string().min(1),
  type: z.enum(MENU_ITEM_TYPES),
  url: z.string().optional(),
  resourceId: z
    .string()
    .optional()
    .describe("GID of the linked page, product, collection or blog"),
  tags: z.array(z.string()).optional(),
  get items(): z.ZodOptional<z.ZodArray<typeof menuItemSchema>> {
    return z.array(menuItemSchema).optional();
  },
});

export function createShopifyNavigationTools(
  client: ShopifyGraphqlClient
): ShopifyTool[] {
  return [
    defineShopifyTool({
      name: "get_menu",
      description:
        "Gets the store's main navigation menu with its full item tree.",
      inputSchema: z.object({}).strict(),
      run: async () => respond(await getMenu(client), formatMenu),
    }),
    defineShopifyTool({
      name: "update_menu",
      description:
        "Replaces a menu's title, handle and items. Items left out are removed; pass existing item IDs to keep them.",
      inputSchema: z
        .object({
          menuId: z.string().min(1),
          title: z.string().min(1),
          handle: z.string().min(1),
          items: z.array(menuItemSchema),
        })
        .strict(),
      run: async (args) =>
        respond(
          await updateMenu(client, args),
          (menu) => `Updated menu.\n${formatMenu(menu)}`
        ),
    }),
  ];
}
