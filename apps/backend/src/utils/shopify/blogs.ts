import type { ShopifyGraphqlClient } from "./client";
import { runShopifyOperation, type ShopifyOperationResult } from "./operation";
import type { ShopifyNodeConnection, ShopifyUserError } from "./types";

export type BlogCommentPolicy =
  | "AUTO_PUBLISHED"
  | "CLOSED"
  | "MODERATED";

export interface Blog {
  id: string;
  title: string;
  handle: string;
  commentPolicy: BlogCommentPolicy;
  createdAt: string;
  updatedAt: string;
  templateSuffix: string | null;
  tags: string[];
}

const BLOG_FIELDS = `
  id
  title
  handle
  commentPolicy
  createdAt
  updatedAt
  templateSuffix
  tags
`;

const GET_BLOGS_QUERY = `
  query GetBlogs($first: Int!) {
    blogs(first: $first) {
      nodes {
        ${BLOG_FIELDS}
      }
    }
  }
`;

const GET_BLOG_QUERY = `
  query GetBlog($id: ID!) {
    blog(id: $id) {
      ${BLOG_FIELDS}
    }
  }
`;

const CREATE_BLOG_MUTATION = `
  mutation BlogCreate($blog: BlogCreateInput!) {
    blogCreate(blog: $blog) {
      blog {
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

const UPDATE_BLOG_MUTATION = `
  mutation BlogUpdate($id: ID!, $blog: BlogUpdateInput!) {
    blogUpdate(id: $id, blog: $blog) {
      blog {
        id
        title
      }
      userErrors {
        code
        field
        message
      }
    }
  }
`;

const DELETE_BLOG_MUTATION = `
  mutation BlogDelete($id: ID!) {
    blogDelete(id: $id) {
      deletedBlogId
      userErrors {
        code
        field
        message
      }
    }
  }
`;

export async function getBlogs(
  client: ShopifyGraphqlClient,
  options: { first?: number } = {}
): Promise<ShopifyOperationResult<Blog[]>> {
  return runShopifyOperation<
    { blogs: ShopifyNodeConnection<Blog> },
    "blogs",
    Blog[]
  >(client, {
    operation: "getBlogs",
    query: GET_BLOGS_QUERY,
    variables: { first: options.first ?? 5 },
    root: "blogs",
    select: (blogs) => blogs.nodes,
  });
}

export async function getBlog(
  client: ShopifyGraphqlClient,
  blogId: string
): Promise<ShopifyOperationResult<Blog>> {
  return runShopifyOperation<{ blog: Blog | null }, "blog", Blog>(client, {
    operation: "getBlog",
    query: GET_BLOG_QUERY,
    variables: { id: blogId },
    root: "blog",
    notFoundMessage: `Blog not found for ID: ${blogId}`,
    select: (blog) => blog,
  });
}

export async function createBlog(
  client: ShopifyGraphqlClient,
  input: { title: string; handle: string; commentPolicy?: BlogCommentPolicy }
): Promise<ShopifyOperationResult<{ id: string; title: string; handle: string }>> {
  return runShopifyOperation<
    {
      blogCreate: {
        blog: { id: string; title: string; handle: string } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "blogCreate",
    { id: string; title: string; handle: string }
  >(client, {
    operation: "createBlog",
    query: CREATE_BLOG_MUTATION,
    variables: {
      blog: {
        title: input.title,
        handle: input.handle,
        commentPolicy: input.commentPolicy ?? "MODERATED",
      },
    },
    root: "blogCreate",
    select: (payload) => payload.blog ?? undefined,
  });
}

export async function updateBlog(
  client: ShopifyGraphqlClient,
  blogId: string,
  input: { title: string }
): Promise<ShopifyOperationResult<{ id: string; title: string }>> {
  return runShopifyOperation<
    {
      blogUpdate: {
        blog: { id: string; title: string } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "blogUpdate",
    { id: string; title: string }
  >(client, {
    operation: "updateBlog",
    query: UPDATE_BLOG_MUTATION,
    variables: { id: blogId, blog: { title: input.title } },
    root: "blogUpdate",
    select: (payload) => payload.blog ?? undefined,
  });
}

export async function deleteBlog(
  client: ShopifyGraphqlClient,
  blogId: string
): Promise<ShopifyOperationResult<{ deletedBlogId: string | null }>> {
  return runShopifyOperation<
    {
      blogDelete: {
        deletedBlogId: string | null;
        userErrors: ShopifyUserError[];
      };
    },
    "blogDelete",
    { deletedBlogId: string | null }
  >(client, {
    operation: "deleteBlog",
    query: DELETE_BLOG_MUTATION,
    variables: { id: blogId },
    root: "blogDelete",
    select: (payload) => ({ deletedBlogId: payload.deletedBlogId ?? null }),
  });
}
