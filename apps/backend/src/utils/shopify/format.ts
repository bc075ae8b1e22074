import type { ArticleDetail, ArticleSummary } from "./articles";
import type { Blog } from "./blogs";
import type { InventoryItemSummary } from "./inventory";
import { renderMenuItems, type Menu } from "./menus";
import type { ShopifyOperationError } from "./operation";
import type { PageDetail, PageSummary } from "./pages";
import type { ProductDetail, ProductSummary } from "./products";
import type { ShopifyUserError } from "./types";
import { trimShopifyGid } from "./utils";

const MAX_BODY_IN_ERROR = 500;
const ARTICLE_PREVIEW_LENGTH = 100;

export function formatUserError(userError: ShopifyUserError): string {
  const field =
    userError.field && userError.field.length > 0
      ? userError.field.join(".")
      : "unknown";
  return `- ${field}: ${userError.message}`;
}

function truncate(value: string, length: number): string {
  return value.length > length ? `${value.slice(0, length)}...` : value;
}

/**
 * Render a failed operation as tool output. Every GraphQL message and every
 * user error is listed.
 */
export function formatShopifyError(error: ShopifyOperationError): string {
  switch (error.kind) {
    case "transport_error": {
      const body = error.body?.trim();
      return body
        ? `Error: ${error.message}\n${truncate(body, MAX_BODY_IN_ERROR)}`
        : `Error: ${error.message}`;
    }
    case "decode_error":
      return `Error: ${error.message}`;
    case "request_error":
      if (error.messages.length === 1) {
        return `Error: ${error.message}`;
      }
      return `Error: GraphQL errors:\n${error.messages
        .map((message) => `- ${message}`)
        .join("\n")}`;
    case "validation_error":
      return `Error: Shopify rejected the request:\n${error.userErrors
        .map(formatUserError)
        .join("\n")}`;
    case "malformed_response":
      return `Error: Unexpected response from Shopify: ${
        error.message
      }\nResponse: ${JSON.stringify(error.response)}`;
    case "not_found":
      return error.message;
  }
}

export function formatProducts(products: ProductSummary[]): string {
  if (products.length === 0) {
    return "No products found.";
  }
  return products
    .map((product) => {
      const variants =
        product.variants.length > 0
          ? product.variants
              .map(
                (variant) =>
                  `  - ${variant.title} ($${variant.price}) [SKU: ${
                    variant.sku || "N/A"
                  }]`
              )
              .join("\n")
          : "  - None";
      return [
        `Product: ${product.title}`,
        `ID: ${product.id}`,
        `Handle: ${product.handle}`,
        `Status: ${product.status} | Inventory: ${
          product.totalInventory ?? "N/A"
        }`,
        `Variants:`,
        variants,
      ].join("\n");
    })
    .join("\n\n");
}

export function formatProduct(product: ProductDetail): string {
  const metafields =
    product.metafields
      .map(
        (metafield) =>
          `- ${metafield.namespace}:${metafield.key} = ${metafield.value}`
      )
      .join("\n") || "None";
  return [
    product.title,
    `ID: ${product.id}`,
    `Handle: ${product.handle}`,
    `Description: ${product.descriptionHtml}`,
    `Metafields:`,
    metafields,
  ].join("\n");
}

export function formatInventoryItems(items: InventoryItemSummary[]): string {
  if (items.length === 0) {
    return "No inventory items found.";
  }
  return items
    .map((item) =>
      [
        `SKU: ${item.sku || "N/A"}`,
        `Tracked: ${item.tracked ? "Yes" : "No"}`,
        `Stock: ${item.available ?? "N/A"}`,
        `Last Updated: ${item.updatedAt}`,
        `ID: ${trimShopifyGid(item.id)}`,
      ].join("\n")
    )
    .join("\n---\n");
}

export function formatPages(pages: PageSummary[]): string {
  if (pages.length === 0) {
    return "No pages found.";
  }
  return pages
    .map((page) => `${page.title} (/${page.handle}) - ID: ${page.id}`)
    .join("\n");
}

export function formatPage(page: PageDetail): string {
  return [
    `Page: ${page.title}`,
    `Handle: ${page.handle}`,
    `ID: ${page.id}`,
    "",
    "HTML Content:",
    page.body,
  ].join("\n");
}

export function formatBlogs(blogs: Blog[]): string {
  if (blogs.length === 0) {
    return "No blogs found.";
  }
  return blogs
    .map((blog) => `${blog.title} (/${blog.handle}) - ID: ${blog.id}`)
    .join("\n");
}

export function formatBlog(blog: Blog): string {
  return [
    `Blog: ${blog.title}`,
    `- Handle: /${blog.handle}`,
    `- ID: ${blog.id}`,
    `- Comment Policy: ${blog.commentPolicy}`,
    `- Created: ${blog.createdAt}`,
    `- Updated: ${blog.updatedAt}`,
    `- Template: ${blog.templateSuffix || "None"}`,
    `- Tags: ${blog.tags.length > 0 ? blog.tags.join(", ") : "None"}`,
  ].join("\n");
}

export function formatArticles(articles: ArticleSummary[]): string {
  if (articles.length === 0) {
    return "No articles found in this blog.";
  }
  return articles
    .map((article) => `${article.title} (ID: ${article.id})`)
    .join("\n");
}

export function formatArticle(article: ArticleDetail): string {
  return [
    `Article: ${article.title} (ID: ${article.id})`,
    `Author: ${article.authorName ?? "Unknown"}`,
    `Blog: ${article.blog?.title ?? "Unknown"}`,
    `Content Preview: ${truncate(article.body, ARTICLE_PREVIEW_LENGTH)}`,
  ].join("\n");
}

export function formatMenu(menu: Menu): string {
  const lines = Array.from(renderMenuItems(menu.items));
  const items = lines.length > 0 ? lines.join("\n") : "  - No items";
  return [
    `Menu: ${menu.title}`,
    `Handle: ${menu.handle}`,
    `ID: ${menu.id}`,
    `Items:`,
    items,
  ].join("\n");
}
