import type { ShopifyGraphqlClient } from "./client";
import {
  operationNotFound,
  runShopifyOperation,
  type ShopifyOperationResult,
} from "./operation";
import type {
  MenuItem,
  MenuItemInput,
  ShopifyEdgeConnection,
  ShopifyUserError,
} from "./types";

export interface Menu {
  id: string;
  title: string;
  handle: string;
  items: MenuItem[];
}

/** Deepest level rendered; Shopify itself only nests a few levels */
export const MAX_MENU_RENDER_DEPTH = 16;

const MENU_ITEM_INDENT = 2;

const GET_FIRST_MENU_ID_QUERY = `
  query GetFirstMenuId {
    menus(first: 1) {
      edges {
        node {
          id
        }
      }
    }
  }
`;

const GET_MENU_QUERY = `
  query GetMenu($id: ID!) {
    menu(id: $id) {
      id
      title
      handle
      items {
        id
        title
        type
        url
        resourceId
        tags
        items {
          id
          title
          type
          url
          resourceId
          tags
          items {
            id
            title
            type
            url
            resourceId
            tags
          }
        }
      }
    }
  }
`;

const UPDATE_MENU_MUTATION = `
  mutation UpdateMenu(
    $id: ID!
    $title: String!
    $handle: String!
    $items: [MenuItemUpdateInput!]!
  ) {
    menuUpdate(id: $id, title: $title, handle: $handle, items: $items) {
      menu {
        id
        title
        handle
        items {
          id
          title
          type
          url
          items {
            id
            title
            type
            url
          }
        }
      }
      userErrors {
        code
        field
        message
      }
    }
  }
`;

/**
 * Fetch the store's menu. The store exposes a single menu, so the first
 * listed ID is resolved and then loaded with its item tree; the two requests
 * run in order.
 */
export async function getMenu(
  client: ShopifyGraphqlClient
): Promise<ShopifyOperationResult<Menu>> {
  const first = await runShopifyOperation<
    { menus: ShopifyEdgeConnection<{ id: string }> },
    "menus",
    { id: string | null }
  >(client, {
    operation: "getMenu",
    query: GET_FIRST_MENU_ID_QUERY,
    root: "menus",
    select: (menus) => ({ id: menus.edges[0]?.node.id ?? null }),
  });

  if (!first.ok) {
    return first;
  }
  if (!first.data.id) {
    return operationNotFound("getMenu", "No menus found in the store.");
  }

  return runShopifyOperation<{ menu?: Menu | null }, "menu", Menu>(client, {
    operation: "getMenu",
    query: GET_MENU_QUERY,
    variables: { id: first.data.id },
    root: "menu",
    notFoundMessage: "Menu not found or could not be fetched.",
    isNotFound: ({ menu }) => typeof menu?.id !== "string",
    select: (menu) => ({ ...menu, items: menu.items ?? [] }),
  });
}

export async function updateMenu(
  client: ShopifyGraphqlClient,
  input: {
    menuId: string;
    title: string;
    handle: string;
    items: MenuItemInput[];
  }
): Promise<ShopifyOperationResult<Menu>> {
  return runShopifyOperation<
    {
      menuUpdate: {
        menu: Menu | null;
        userErrors: ShopifyUserError[];
      };
    },
    "menuUpdate",
    Menu
  >(client, {
    operation: "updateMenu",
    query: UPDATE_MENU_MUTATION,
    variables: {
      id: input.menuId,
      title: input.title,
      handle: input.handle,
      items: input.items,
    },
    root: "menuUpdate",
    select: ({ menu }) =>
      menu ? { ...menu, items: menu.items ?? [] } : undefined,
  });
}

/**
 * Depth-first, one line per item, two extra spaces per level:
 * `  - Home (FRONTPAGE): /`. Lines are produced lazily; nesting below
 * MAX_MENU_RENDER_DEPTH is replaced with a single truncation line.
 */
export function* renderMenuItems(
  items: readonly MenuItem[],
  depth = 0
): Generator<string, void, undefined> {
  const indent = " ".repeat(MENU_ITEM_INDENT * (depth + 1));

  if (depth >= MAX_MENU_RENDER_DEPTH) {
    if (items.length > 0) {
      yield `${indent}- … (nesting truncated)`;
    }
    return;
  }

  for (const item of items) {
    yield `${indent}- ${item.title} (${item.type}): ${item.url || "N/A"}`;
    if (item.items && item.items.length > 0) {
      yield* renderMenuItems(item.items, depth + 1);
    }
  }
}
