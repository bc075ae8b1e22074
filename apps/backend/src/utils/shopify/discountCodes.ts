import type { ShopifyGraphqlClient } from "./client";
import {
  compactVariables,
  runShopifyOperation,
  type ShopifyOperationResult,
} from "./operation";
import type { ShopifyNodeConnection, ShopifyUserError } from "./types";

/**
 * `codeDiscount` is a union; only the basic and buy-X-get-Y members are
 * selected, anything else comes back as an empty object.
 */
export interface CodeDiscount {
  title?: string;
  summary?: string;
  codesCount?: { count: number };
  codes?: { nodes: Array<{ id: string; code: string }> };
}

export interface CodeDiscountNode {
  id: string;
  codeDiscount: CodeDiscount;
}

const LIST_DISCOUNT_CODES_QUERY = `
  query ListDiscountCodes($first: Int, $after: String, $query: String) {
    codeDiscountNodes(first: $first, after: $after, query: $query) {
      nodes {
        id
        codeDiscount {
          ... on DiscountCodeBasic {
            title
            summary
          }
          ... on DiscountCodeBxgy {
            title
            codesCount {
              count
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

const GET_DISCOUNT_CODE_QUERY = `
  query GetDiscountCode($id: ID!) {
    codeDiscountNode(id: $id) {
      id
      codeDiscount {
        ... on DiscountCodeBasic {
          title
          summary
          codes(first: 1) {
            nodes {
              id
              code
            }
          }
        }
      }
    }
  }
`;

const DELETE_DISCOUNT_CODE_MUTATION = `
  mutation DiscountCodeDelete($id: ID!) {
    discountCodeDelete(id: $id) {
      deletedCodeDiscountId
      userErrors {
        code
        field
        message
      }
    }
  }
`;

export async function listDiscountCodes(
  client: ShopifyGraphqlClient,
  options: { first?: number; after?: string; query?: string } = {}
): Promise<ShopifyOperationResult<ShopifyNodeConnection<CodeDiscountNode>>> {
  return runShopifyOperation<
    { codeDiscountNodes: ShopifyNodeConnection<CodeDiscountNode> },
    "codeDiscountNodes",
    ShopifyNodeConnection<CodeDiscountNode>
  >(client, {
    operation: "listDiscountCodes",
    query: LIST_DISCOUNT_CODES_QUERY,
    variables: compactVariables({
      first: options.first ?? 10,
      after: options.after,
      query: options.query,
    }),
    root: "codeDiscountNodes",
    select: (codeDiscountNodes) => codeDiscountNodes,
  });
}

export async function getDiscountCode(
  client: ShopifyGraphqlClient,
  discountNodeId: string
): Promise<ShopifyOperationResult<CodeDiscountNode>> {
  return runShopifyOperation<
    { codeDiscountNode: CodeDiscountNode | null },
    "codeDiscountNode",
    CodeDiscountNode
  >(client, {
    operation: "getDiscountCode",
    query: GET_DISCOUNT_CODE_QUERY,
    variables: { id: discountNodeId },
    root: "codeDiscountNode",
    notFoundMessage: `Discount code not found for ID: ${discountNodeId}`,
    select: (codeDiscountNode) => codeDiscountNode,
  });
}

export async function deleteDiscountCode(
  client: ShopifyGraphqlClient,
  discountCodeId: string
): Promise<ShopifyOperationResult<{ deletedCodeDiscountId: string | null }>> {
  return runShopifyOperation<
    {
      discountCodeDelete: {
        deletedCodeDiscountId: string | null;
        userErrors: ShopifyUserError[];
      };
    },
    "discountCodeDelete",
    { deletedCodeDiscountId: string | null }
  >(client, {
    operation: "deleteDiscountCode",
    query: DELETE_DISCOUNT_CODE_MUTATION,
    variables: { id: discountCodeId },
    root: "discountCodeDelete",
    select: (payload) => ({
      deletedCodeDiscountId: payload.deletedCodeDiscountId ?? null,
    }),
  });
}
