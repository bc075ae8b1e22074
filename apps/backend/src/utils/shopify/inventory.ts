import type { ShopifyGraphqlClient } from "./client";
import { runShopifyOperation, type ShopifyOperationResult } from "./operation";
import type { ShopifyEdgeConnection } from "./types";

export interface InventoryItemSummary {
  id: string;
  sku: string | null;
  tracked: boolean;
  createdAt: string;
  updatedAt: string;
  /** Available quantity at the first inventory level, null when unknown */
  available: number | null;
}

const GET_INVENTORY_ITEMS_QUERY = `
  query GetInventoryItems($first: Int!) {
    inventoryItems(first: $first) {
      edges {
        node {
          id
          tracked
          sku
          createdAt
          updatedAt
          inventoryLevels(first: 1) {
            edges {
              node {
                quantities(names: ["available"]) {
                  name
                  quantity
                }
              }
            }
          }
        }
      }
    }
  }
`;

type InventoryItemNode = Omit<InventoryItemSummary, "available"> & {
  inventoryLevels?: ShopifyEdgeConnection<{
    quantities?: Array<{ name: string; quantity: number }>;
  }>;
};

export async function getInventoryItems(
  client: ShopifyGraphqlClient,
  options: { first?: number } = {}
): Promise<ShopifyOperationResult<InventoryItemSummary[]>> {
  return runShopifyOperation<
    { inventoryItems: ShopifyEdgeConnection<InventoryItemNode> },
    "inventoryItems",
    InventoryItemSummary[]
  >(client, {
    operation: "getInventoryItems",
    query: GET_INVENTORY_ITEMS_QUERY,
    variables: { first: options.first ?? 5 },
    root: "inventoryItems",
    select: (inventoryItems) =>
      inventoryItems.edges.map(({ node }) => {
        const level = node.inventoryLevels?.edges[0]?.node;
        const available = level?.quantities?.find(
          (quantity) => quantity.name === "available"
        );
        return {
          id: node.id,
          sku: node.sku ?? null,
          tracked: node.tracked,
          createdAt: node.createdAt,
          updatedAt: node.updatedAt,
          available: available ? available.quantity : null,
        };
      }),
  });
}
