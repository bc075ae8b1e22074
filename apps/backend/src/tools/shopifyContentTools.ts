import { z } from "zod";

import {
  createArticle,
  deleteArticle,
  getArticle,
  getArticles,
  updateArticle,
} from "../utils/shopify/articles";
import {
  createBlog,
  deleteBlog,
  getBlog,
  getBlogs,
  updateBlog,
} from "../utils/shopify/blogs";
import type { ShopifyGraphqlClient } from "../utils/shopify/client";
import {
  formatArticle,
  formatArticles,
  formatBlog,
  formatBlogs,
  formatPage,
  formatPages,
} from "../utils/shopify/format";
import {
  createPage,
  deletePage,
  getPage,
  getPages,
  updatePageBody,
} from "../utils/shopify/pages";

import {
  defineShopifyTool,
  firstNSchema,
  respond,
  toolError,
  type ShopifyTool,
} from "./shopifyTool";

const gid = (example: string) =>
  z.string().min(1).describe(`Shopify GID, e.g. ${example}`);

function createPageTools(client: ShopifyGraphqlClient): ShopifyTool[] {
  return [
    defineShopifyTool({
      name: "get_pages",
      description: "Lists online store pages with their handles and IDs.",
      inputSchema: z.object({ firstN: firstNSchema(5) }).strict(),
      run: async ({ firstN: first }) =>
        respond(await getPages(client, { first }), formatPages),
    }),
    defineShopifyTool({
      name: "get_page",
      description: "Gets a page by GID, including its HTML body.",
      inputSchema: z
        .object({ pageId: gid("gid://shopify/Page/123") })
        .strict(),
      run: async ({ pageId }) =>
        respond(await getPage(client, pageId), formatPage),
    }),
    defineShopifyTool({
      name: "create_page",
      description: "Creates an online store page.",
      inputSchema: z
        .object({
          title: z.string().min(1),
          handle: z.string().min(1),
          body: z.string().describe("Page body HTML"),
          isPublished: z.boolean().default(true),
          templateSuffix: z.string().default("custom"),
        })
        .strict(),
      run: async (args) =>
        respond(
          await createPage(client, args),
          (page) =>
            `Created page ${page.title} (/${page.handle}) - ID: ${page.id}`
        ),
    }),
    defineShopifyTool({
      name: "update_page",
      description: "Replaces the HTML body of a page.",
      inputSchema: z
        .object({
          pageId: gid("gid://shopify/Page/123"),
          body: z.string().describe("New page body HTML"),
        })
        .strict(),
      run: async ({ pageId, body }) =>
        respond(
          await updatePageBody(client, pageId, body),
          (page) => `Updated page ${page.title} (ID: ${page.id})`
        ),
    }),
    defineShopifyTool({
      name: "delete_page",
      description: "Deletes a page by GID.",
      inputSchema: z
        .object({ pageId: gid("gid://shopify/Page/123") })
        .strict(),
      run: async ({ pageId }) =>
        respond(
          await deletePage(client, pageId),
          (deleted) => `Deleted page ${deleted.deletedPageId ?? pageId}`
        ),
    }),
  ];
}

function createBlogTools(client: ShopifyGraphqlClient): ShopifyTool[] {
  return [
    defineShopifyTool({
      name: "get_blogs",
      description: "Lists blogs with their handles and IDs.",
      inputSchema: z.object({ firstN: firstNSchema(5) }).strict(),
      run: async ({ firstN: first }) =>
        respond(await getBlogs(client, { first }), formatBlogs),
    }),
    defineShopifyTool({
      name: "get_blog",
      description: "Gets a blog by GID.",
      inputSchema: z
        .object({ blogId: gid("gid://shopify/Blog/123") })
        .strict(),
      run: async ({ blogId }) =>
        respond(await getBlog(client, blogId), formatBlog),
    }),
    defineShopifyTool({
      name: "create_blog",
      description: "Creates a blog.",
      inputSchema: z
        .object({
          title: z.string().min(1),
          handle: z.string().min(1),
          commentPolicy: z
            .enum(["AUTO_PUBLISHED", "CLOSED", "MODERATED"])
            .default("MODERATED"),
        })
        .strict(),
      run: async (args) =>
        respond(
          await createBlog(client, args),
          (blog) =>
            `Created blog ${blog.title} (/${blog.handle}) - ID: ${blog.id}`
        ),
    }),
    defineShopifyTool({
      name: "update_blog",
      description: "Renames a blog.",
      inputSchema: z
        .object({
          blogId: gid("gid://shopify/Blog/123"),
          title: z.string().min(1),
        })
        .strict(),
      run: async ({ blogId, title }) =>
        respond(
          await updateBlog(client, blogId, { title }),
          (blog) => `Updated blog ${blog.title} (ID: ${blog.id})`
        ),
    }),
    defineShopifyTool({
      name: "delete_blog",
      description: "Deletes a blog and its articles.",
      inputSchema: z
        .object({ blogId: gid("gid://shopify/Blog/123") })
        .strict(),
      run: async ({ blogId }) =>
        respond(
          await deleteBlog(client, blogId),
          (deleted) => `Deleted blog ${deleted.deletedBlogId ?? blogId}`
        ),
    }),
  ];
}

function createArticleTools(client: ShopifyGraphqlClient): ShopifyTool[] {
  return [
    defineShopifyTool({
      name: "get_articles",
      description: "Lists the articles of a blog.",
      inputSchema: z
        .object({
          blogId: gid("gid://shopify/Blog/123"),
          firstN: firstNSchema(5),
        })
        .strict(),
      run: async ({ blogId, firstN: first }) =>
        respond(await getArticles(client, blogId, { first }), formatArticles),
    }),
    defineShopifyTool({
      name: "get_article",
      description: "Gets an article by GID with its author and blog.",
      inputSchema: z
        .object({ articleId: gid("gid://shopify/Article/123") })
        .strict(),
      run: async ({ articleId }) =>
        respond(await getArticle(client, articleId), formatArticle),
    }),
    defineShopifyTool({
      name: "create_article",
      description: "Creates an article in a blog.",
      inputSchema: z
        .object({
          blogId: gid("gid://shopify/Blog/123"),
          title: z.string().min(1),
          body: z.string().describe("Article body HTML"),
          authorName: z.string().min(1),
          isPublished: z.boolean().default(true),
        })
        .strict(),
      run: async (args) =>
        respond(
          await createArticle(client, args),
          (article) => `Created article ${article.title} (ID: ${article.id})`
        ),
    }),
    defineShopifyTool({
      name: "update_article",
      description: "Updates the title and/or body of an article.",
      inputSchema: z
        .object({
          articleId: gid("gid://shopify/Article/123"),
          title: z.string().min(1).optional(),
          body: z.string().optional(),
        })
        .strict(),
      run: async ({ articleId, title, body }) => {
        if (title === undefined && body === undefined) {
          return toolError("Error: Provide a title or body to update.");
        }
        return respond(
          await updateArticle(client, articleId, { title, body }),
          (article) => `Updated article ${article.title} (ID: ${article.id})`
        );
      },
    }),
    defineShopifyTool({
      name: "delete_article",
      description: "Deletes an article by GID.",
      inputSchema: z
        .object({ articleId: gid("gid://shopify/Article/123") })
        .strict(),
      run: async ({ articleId }) =>
        respond(
          await deleteArticle(client, articleId),
          (deleted) =>
            `Deleted article ${deleted.deletedArticleId ?? articleId}`
        ),
    }),
  ];
}

export function createShopifyContentTools(
  client: ShopifyGraphqlClient
): ShopifyTool[] {
  return [
    ...createPageTools(client),
    ...createBlogTools(client),
    ...createArticleTools(client),
  ];
}
