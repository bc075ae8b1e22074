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
  ShopifyUserError,
} from "./types";

export interface CustomerAddress {
  address1: string | null;
  city: string | null;
  province: string | null;
  country: string | null;
  zip: string | null;
}

export interface Customer {
  id: string;
  firstName: string | null;
  lastName: string | null;
  email: string | null;
  phone?: string | null;
  createdAt: string;
  updatedAt: string;
  numberOfOrders: string;
  amountSpent: ShopifyMoney;
  tags: string[];
  defaultAddress: CustomerAddress | null;
}

export type CustomerSortKey =
  | "CREATED_AT"
  | "ID"
  | "LOCATION"
  | "NAME"
  | "RELEVANCE"
  | "UPDATED_AT";

export interface ListCustomersOptions {
  first?: number;
  after?: string;
  query?: string;
  sortKey?: CustomerSortKey;
}

const CUSTOMER_FIELDS = `
  id
  firstName
  lastName
  email
  createdAt
  updatedAt
  numberOfOrders
  amountSpent {
    amount
    currencyCode
  }
  tags
  defaultAddress {
    address1
    city
    province
    country
    zip
  }
`;

const LIST_CUSTOMERS_QUERY = `
  query ListCustomers($first: Int, $after: String, $query: String, $sortKey: CustomerSortKeys) {
    customers(first: $first, after: $after, query: $query, sortKey: $sortKey) {
      edges {
        cursor
        node {
          ${CUSTOMER_FIELDS}
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

const COUNT_CUSTOMERS_QUERY = `
  query CountCustomers($query: String, $limit: Int) {
    customersCount(query: $query, limit: $limit) {
      count
      precision
    }
  }
`;

const GET_CUSTOMER_QUERY = `
  query GetCustomer($id: ID!) {
    customer(id: $id) {
      ${CUSTOMER_FIELDS}
      phone
    }
  }
`;

const SEND_INVITE_MUTATION = `
  mutation CustomerSendAccountInviteEmail($customerId: ID!) {
    customerSendAccountInviteEmail(customerId: $customerId) {
      customer {
        id
      }
      userErrors {
        field
        message
      }
    }
  }
`;

export async function listCustomers(
  client: ShopifyGraphqlClient,
  options: ListCustomersOptions = {}
): Promise<ShopifyOperationResult<ShopifyEdgeConnection<Customer>>> {
  return runShopifyOperation<
    { customers: ShopifyEdgeConnection<Customer> },
    "customers",
    ShopifyEdgeConnection<Customer>
  >(client, {
    operation: "listCustomers",
    query: LIST_CUSTOMERS_QUERY,
    variables: compactVariables({
      first: options.first ?? 10,
      after: options.after,
      query: options.query,
      sortKey: options.sortKey,
    }),
    root: "customers",
    select: (customers) => customers,
  });
}

export async function countCustomers(
  client: ShopifyGraphqlClient,
  options: { query?: string; limit?: number } = {}
): Promise<ShopifyOperationResult<ShopifyCount>> {
  return runShopifyOperation<
    { customersCount: ShopifyCount },
    "customersCount",
    ShopifyCount
  >(client, {
    operation: "countCustomers",
    query: COUNT_CUSTOMERS_QUERY,
    variables: compactVariables({
      query: options.query,
      limit: options.limit ?? 10000,
    }),
    root: "customersCount",
    select: (customersCount) =>
      typeof customersCount.count === "number" ? customersCount : undefined,
  });
}

export async function getCustomer(
  client: ShopifyGraphqlClient,
  customerId: string
): Promise<ShopifyOperationResult<Customer>> {
  return runShopifyOperation<{ customer: Customer | null }, "customer", Customer>(
    client,
    {
      operation: "getCustomer",
      query: GET_CUSTOMER_QUERY,
      variables: { id: customerId },
      root: "customer",
      notFoundMessage: `Customer not found for ID: ${customerId}`,
      select: (customer) => customer,
    }
  );
}

export async function sendCustomerInvite(
  client: ShopifyGraphqlClient,
  customerId: string
): Promise<ShopifyOperationResult<{ customerId: string }>> {
  return runShopifyOperation<
    {
      customerSendAccountInviteEmail: {
        customer: { id: string } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "customerSendAccountInviteEmail",
    { customerId: string }
  >(client, {
    operation: "sendCustomerInvite",
    query: SEND_INVITE_MUTATION,
    variables: { customerId },
    root: "customerSendAccountInviteEmail",
    select: ({ customer }) => ({ customerId: customer?.id ?? customerId }),
  });
}
