import type { ShopifyGraphqlClient } from "./client";
import {
  compactVariables,
  runShopifyOperation,
  type ShopifyOperationResult,
} from "./operation";
import type { ShopifyNodeConnection, ShopifyUserError } from "./types";

export interface ArticleSummary {
  id: string;
  title: string;
  body: string;
}

export interface ArticleDetail extends ArticleSummary {
  authorName: string | null;
  blog: { id: string; title: string } | null;
}

export interface CreateArticleInput {
  blogId: string;
  title: string;
  body: string;
  authorName: string;
  isPublished?: boolean;
}

const GET_ARTICLES_QUERY = `
  query GetArticles($id: ID!, $first: Int!) {
    blog(id: $id) {
      articles(first: $first) {
        nodes {
          id
          title
          body
        }
      }
    }
  }
`;

const GET_ARTICLE_QUERY = `
  query GetArticle($id: ID!) {
    article(id: $id) {
      id
      title
      body
      author {
        name
      }
      blog {
        id
        title
      }
    }
  }
`;

const CREATE_ARTICLE_MUTATION = `
  mutation ArticleCreate($article: ArticleCreateInput!) {
    articleCreate(article: $article) {
      article {
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

const UPDATE_ARTICLE_MUTATION = `
  mutation ArticleUpdate($id: ID!, $article: ArticleUpdateInput!) {
    articleUpdate(id: $id, article: $article) {
      article {
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

const DELETE_ARTICLE_MUTATION = `
  mutation ArticleDelete($id: ID!) {
    articleDelete(id: $id) {
      deletedArticleId
      userErrors {
        code
        field
        message
      }
    }
  }
`;

export async function getArticles(
  client: ShopifyGraphqlClient,
  blogId: string,
  options: { first?: number } = {}
): Promise<ShopifyOperationResult<ArticleSummary[]>> {
  return runShopifyOperation<
    { blog: { articles: ShopifyNodeConnection<ArticleSummary> } | null },
    "blog",
    ArticleSummary[]
  >(client, {
    operation: "getArticles",
    query: GET_ARTICLES_QUERY,
    variables: { id: blogId, first: options.first ?? 5 },
    root: "blog",
    notFoundMessage: `Blog not found for ID: ${blogId}`,
    select: (blog) => blog.articles?.nodes,
  });
}

export async function getArticle(
  client: ShopifyGraphqlClient,
  articleId: string
): Promise<ShopifyOperationResult<ArticleDetail>> {
  return runShopifyOperation<
    {
      article:
        | (ArticleSummary & {
            author: { name: string } | null;
            blog: { id: string; title: string } | null;
          })
        | null;
    },
    "article",
    ArticleDetail
  >(client, {
    operation: "getArticle",
    query: GET_ARTICLE_QUERY,
    variables: { id: articleId },
    root: "article",
    notFoundMessage: `Article not found for ID: ${articleId}`,
    select: (article) => ({
      id: article.id,
      title: article.title,
      body: article.body,
      authorName: article.author?.name ?? null,
      blog: article.blog ?? null,
    }),
  });
}

export async function createArticle(
  client: ShopifyGraphqlClient,
  input: CreateArticleInput
): Promise<ShopifyOperationResult<ArticleSummary>> {
  return runShopifyOperation<
    {
      articleCreate: {
        article: ArticleSummary | null;
        userErrors: ShopifyUserError[];
      };
    },
    "articleCreate",
    ArticleSummary
  >(client, {
    operation: "createArticle",
    query: CREATE_ARTICLE_MUTATION,
    variables: {
      article: {
        blogId: input.blogId,
        title: input.title,
        body: input.body,
        // ArticleCreateInput takes the author as an object
        author: { name: input.authorName },
        isPublished: input.isPublished ?? true,
      },
    },
    root: "articleCreate",
    select: (payload) => payload.article ?? undefined,
  });
}

export async function updateArticle(
  client: ShopifyGraphqlClient,
  articleId: string,
  input: { title?: string; body?: string }
): Promise<ShopifyOperationResult<ArticleSummary>> {
  return runShopifyOperation<
    {
      articleUpdate: {
        article: ArticleSummary | null;
        userErrors: ShopifyUserError[];
      };
    },
    "articleUpdate",
    ArticleSummary
  >(client, {
    operation: "updateArticle",
    query: UPDATE_ARTICLE_MUTATION,
    variables: {
      id: articleId,
      article: compactVariables({ title: input.title, body: input.body }),
    },
    root: "articleUpdate",
    select: (payload) => payload.article ?? undefined,
  });
}

export async function deleteArticle(
  client: ShopifyGraphqlClient,
  articleId: string
): Promise<ShopifyOperationResult<{ deletedArticleId: string | null }>> {
  return runShopifyOperation<
    {
      articleDelete: {
        deletedArticleId: string | null;
        userErrors: ShopifyUserError[];
      };
    },
    "articleDelete",
    { deletedArticleId: string | null }
  >(client, {
    operation: "deleteArticle",
    query: DELETE_ARTICLE_MUTATION,
    variables: { id: articleId },
    root: "articleDelete",
    select: (payload) => ({
      deletedArticleId: payload.deletedArticleId ?? null,
    }),
  });
}
