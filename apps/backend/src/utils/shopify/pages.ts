import type { ShopifyGraphqlClient } from "./client";
import {
  compactVariables,
  runShopifyOperation,
  type ShopifyOperationResult,
} from "./operation";
import type { ShopifyEdgeConnection, ShopifyUserError } from "./types";

export interface PageSummary {
  id: string;
  title: string;
  handle: string;
  publishedAt: string | null;
}

export interface PageDetail {
  id: string;
  title: string;
  handle: string;
  body: string;
}

export interface CreatePageInput {
  title: string;
  handle: string;
  body: string;
  isPublished?: boolean;
  templateSuffix?: string;
}

const GET_PAGES_QUERY = `
  query GetPages($first: Int!) {
    pages(first: $first) {
      edges {
        node {
          id
          title
          handle
          publishedAt
        }
      }
    }
  }
`;

const GET_PAGE_QUERY = `
  query GetPage($id: ID!) {
    page(id: $id) {
      id
      title
      body
      handle
    }
  }
`;

const CREATE_PAGE_MUTATION = `
  mutation PageCreate($page: PageCreateInput!) {
    pageCreate(page: $page) {
      page {
        id
        title
        handle
      }
      userErrors {
        code
        field
        message
      }
    }
  }
`;

const UPDATE_PAGE_MUTATION = `
  mutation PageUpdate($id: ID!, $page: PageUpdateInput!) {
    pageUpdate(id: $id, page: $page) {
      page {
        id
        title
        body
      }
      userErrors {
        code
        field
        message
      }
    }
  }
`;

const DELETE_PAGE_MUTATION = `
  mutation PageDelete($id: ID!) {
    pageDelete(id: $id) {
      deletedPageId
      userErrors {
        code
        field
        message
      }
    }
  }
`;

export async function getPages(
  client: ShopifyGraphqlClient,
  options: { first?: number } = {}
): Promise<ShopifyOperationResult<PageSummary[]>> {
  return runShopifyOperation<
    { pages: ShopifyEdgeConnection<PageSummary> },
    "pages",
    PageSummary[]
  >(client, {
    operation: "getPages",
    query: GET_PAGES_QUERY,
    variables: { first: options.first ?? 5 },
    root: "pages",
    select: (pages) => pages.edges.map((edge) => edge.node),
  });
}

export async function getPage(
  client: ShopifyGraphqlClient,
  pageId: string
): Promise<ShopifyOperationResult<PageDetail>> {
  return runShopifyOperation<{ page: PageDetail | null }, "page", PageDetail>(
    client,
    {
      operation: "getPage",
      query: GET_PAGE_QUERY,
      variables: { id: pageId },
      root: "page",
      notFoundMessage: `No page found with ID ${pageId}.`,
      select: (page) => page,
    }
  );
}

/**
 * Create an online store page. Newly created pages are not linked from the
 * navigation; callers add them to the menu with updateMenu.
 */
export async function createPage(
  client: ShopifyGraphqlClient,
  input: CreatePageInput
): Promise<ShopifyOperationResult<{ id: string; title: string; handle: string }>> {
  return runShopifyOperation<
    {
      pageCreate: {
        page: { id: string; title: string; handle: string } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "pageCreate",
    { id: string; title: string; handle: string }
  >(client, {
    operation: "createPage",
    query: CREATE_PAGE_MUTATION,
    variables: {
      page: compactVariables({
        title: input.title,
        handle: input.handle,
        body: input.body,
        isPublished: input.isPublished ?? true,
        templateSuffix: input.templateSuffix ?? "custom",
      }),
    },
    root: "pageCreate",
    select: (payload) => payload.page ?? undefined,
  });
}

export async function updatePageBody(
  client: ShopifyGraphqlClient,
  pageId: string,
  body: string
): Promise<ShopifyOperationResult<{ id: string; title: string; body: string }>> {
  return runShopifyOperation<
    {
      pageUpdate: {
        page: { id: string; title: string; body: string } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "pageUpdate",
    { id: string; title: string; body: string }
  >(client, {
    operation: "updatePageBody",
    query: UPDATE_PAGE_MUTATION,
    variables: { id: pageId, page: { body } },
    root: "pageUpdate",
    select: (payload) => payload.page ?? undefined,
  });
}

export async function deletePage(
  client: ShopifyGraphqlClient,
  pageId: string
): Promise<ShopifyOperationResult<{ deletedPageId: string | null }>> {
  return runShopifyOperation<
    {
      pageDelete: {
        deletedPageId: string | null;
        userErrors: ShopifyUserError[];
      };
    },
    "pageDelete",
    { deletedPageId: string | null }
  >(client, {
    operation: "deletePage",
    query: DELETE_PAGE_MUTATION,
    variables: { id: pageId },
    root: "pageDelete",
    select: (payload) => ({ deletedPageId: payload.deletedPageId ?? null }),
  });
}
