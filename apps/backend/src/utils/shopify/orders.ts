import type { ShopifyGraphqlClient } from "./client";
import {
  compactVariables,
  runShopifyOperation,
  type ShopifyOperationResult,
} from "./operation";
import type {
  ShopifyCount,
  ShopifyEdgeConnection,
  ShopifyMoney,
} from "./types";

export interface Order {
  id: string;
  name: string;
  createdAt: string;
  totalPriceSet: { shopMoney: ShopifyMoney };
  customer: {
    id: string;
    firstName: string | null;
    lastName: string | null;
    email: string | null;
  } | null;
  lineItems: ShopifyEdgeConnection<{
    title: string;
    quantity: number;
    originalUnitPriceSet: { shopMoney: ShopifyMoney };
  }>;
}

export type OrderSortKey =
  | "CREATED_AT"
  | "CUSTOMER_NAME"
  | "FINANCIAL_STATUS"
  | "FULFILLMENT_STATUS"
  | "ID"
  | "ORDER_NUMBER"
  | "PROCESSED_AT"
  | "RELEVANCE"
  | "TOTAL_PRICE"
  | "UPDATED_AT";

export interface ListOrdersOptions {
  first?: number;
  after?: string;
  query?: string;
  sortKey?: OrderSortKey;
}

const LIST_ORDERS_QUERY = `
  query ListOrders($first: Int, $after: String, $query: String, $sortKey: OrderSortKeys) {
    orders(first: $first, after: $after, query: $query, sortKey: $sortKey) {
      edges {
        cursor
        node {
          id
          name
          createdAt
          totalPriceSet {
            shopMoney {
              amount
              currencyCode
            }
          }
          customer {
            id
            firstName
            lastName
            email
          }
          lineItems(first: 10) {
            edges {
              node {
                title
                quantity
                originalUnitPriceSet {
                  shopMoney {
                    amount
                    currencyCode
                  }
                }
              }
            }
          }
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

const COUNT_ORDERS_QUERY = `
  query CountOrders($query: String, $limit: Int) {
    ordersCount(query: $query, limit: $limit) {
      count
      precision
    }
  }
`;

export async function listOrders(
  client: ShopifyGraphqlClient,
  options: ListOrdersOptions = {}
): Promise<ShopifyOperationResult<ShopifyEdgeConnection<Order>>> {
  return runShopifyOperation<
    { orders: ShopifyEdgeConnection<Order> },
    "orders",
    ShopifyEdgeConnection<Order>
  >(client, {
    operation: "listOrders",
    query: LIST_ORDERS_QUERY,
    variables: compactVariables({
      first: options.first ?? 10,
      after: options.after,
      query: options.query,
      sortKey: options.sortKey,
    }),
    root: "orders",
    select: (orders) => orders,
  });
}

export async function countOrders(
  client: ShopifyGraphqlClient,
  options: { query?: string; limit?: number } = {}
): Promise<ShopifyOperationResult<ShopifyCount>> {
  return runShopifyOperation<
    { ordersCount: ShopifyCount },
    "ordersCount",
    ShopifyCount
  >(client, {
    operation: "countOrders",
    query: COUNT_ORDERS_QUERY,
    variables: compactVariables({
      query: options.query,
      limit: options.limit ?? 10000,
    }),
    root: "ordersCount",
    select: (ordersCount) =>
      typeof ordersCount.count === "number" ? ordersCount : undefined,
  });
}
