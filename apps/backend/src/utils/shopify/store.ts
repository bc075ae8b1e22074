import type { ShopifyGraphqlClient } from "./client";
import { runShopifyOperation, type ShopifyOperationResult } from "./operation";
import type { ShopifyNodeConnection, ShopifyUserError } from "./types";

export interface ShopInfo {
  id: string;
  name: string;
  description: string | null;
  email: string;
  contactEmail: string;
  url: string;
  myshopifyDomain: string;
  currencyCode: string;
  ianaTimezone: string;
  features: { storefront: boolean };
}

export interface StoreLocation {
  id: string;
  name: string;
  address: {
    address1: string | null;
    address2: string | null;
    city: string | null;
    province: string | null;
    country: string | null;
    zip: string | null;
  };
}

export interface Publication {
  id: string;
  name: string;
  handle: string | null;
}

const GET_SHOP_INFO_QUERY = `
  query GetShopInfo {
    shop {
      id
      name
      description
      email
      contactEmail
      url
      myshopifyDomain
      currencyCode
      ianaTimezone
      features {
        storefront
      }
    }
  }
`;

const GET_LOCATIONS_QUERY = `
  query GetLocations($first: Int!) {
    locations(first: $first) {
      nodes {
        id
        name
        address {
          address1
          address2
          city
          province
          country
          zip
        }
      }
    }
  }
`;

const GET_PUBLICATIONS_QUERY = `
  query GetPublications {
    publications(first: 20) {
      nodes {
        id
        name
        channel {
          handle
        }
      }
    }
  }
`;

const PUBLISH_PRODUCT_MUTATION = `
  mutation PublishProduct($id: ID!, $publicationIds: [ID!]!) {
    publishablePublish(id: $id, input: { publicationIds: $publicationIds }) {
      publishable {
        ... on Product {
          id
          title
          publishedOnCurrentPublication
        }
      }
      userErrors {
        field
        message
      }
    }
  }
`;

const PRODUCT_PUBLISHED_QUERY = `
  query ProductPublished($id: ID!, $publicationId: ID!) {
    product(id: $id) {
      id
      title
      publishedOnPublication(publicationId: $publicationId)
    }
  }
`;

export async function getShopInfo(
  client: ShopifyGraphqlClient
): Promise<ShopifyOperationResult<ShopInfo>> {
  return runShopifyOperation<{ shop: ShopInfo }, "shop", ShopInfo>(client, {
    operation: "getShopInfo",
    query: GET_SHOP_INFO_QUERY,
    root: "shop",
    select: (shop) => shop,
  });
}

export async function getLocations(
  client: ShopifyGraphqlClient,
  options: { first?: number } = {}
): Promise<ShopifyOperationResult<StoreLocation[]>> {
  return runShopifyOperation<
    { locations: ShopifyNodeConnection<StoreLocation> },
    "locations",
    StoreLocation[]
  >(client, {
    operation: "getLocations",
    query: GET_LOCATIONS_QUERY,
    variables: { first: options.first ?? 50 },
    root: "locations",
    select: (locations) => locations.nodes,
  });
}

export async function getPublications(
  client: ShopifyGraphqlClient
): Promise<ShopifyOperationResult<Publication[]>> {
  return runShopifyOperation<
    {
      publications: ShopifyNodeConnection<{
        id: string;
        name: string;
        channel: { handle: string } | null;
      }>;
    },
    "publications",
    Publication[]
  >(client, {
    operation: "getPublications",
    query: GET_PUBLICATIONS_QUERY,
    root: "publications",
    select: (publications) =>
      publications.nodes.map((publication) => ({
        id: publication.id,
        name: publication.name,
        handle: publication.channel?.handle ?? null,
      })),
  });
}

export async function publishProduct(
  client: ShopifyGraphqlClient,
  input: { productId: string; publicationId: string }
): Promise<
  ShopifyOperationResult<{
    id: string;
    title: string;
    publishedOnCurrentPublication: boolean;
  }>
> {
  return runShopifyOperation<
    {
      publishablePublish: {
        publishable: {
          id?: string;
          title?: string;
          publishedOnCurrentPublication?: boolean;
        } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "publishablePublish",
    { id: string; title: string; publishedOnCurrentPublication: boolean }
  >(client, {
    operation: "publishProduct",
    query: PUBLISH_PRODUCT_MUTATION,
    variables: {
      id: input.productId,
      publicationIds: [input.publicationId],
    },
    root: "publishablePublish",
    select: ({ publishable }) =>
      publishable?.id && publishable.title !== undefined
        ? {
            id: publishable.id,
            title: publishable.title,
            publishedOnCurrentPublication:
              publishable.publishedOnCurrentPublication ?? false,
          }
        : undefined,
  });
}

export async function isProductPublished(
  client: ShopifyGraphqlClient,
  input: { productId: string; publicationId: string }
): Promise<
  ShopifyOperationResult<{ id: string; title: string; published: boolean }>
> {
  return runShopifyOperation<
    {
      product: {
        id: string;
        title: string;
        publishedOnPublication: boolean;
      } | null;
    },
    "product",
    { id: string; title: string; published: boolean }
  >(client, {
    operation: "isProductPublished",
    query: PRODUCT_PUBLISHED_QUERY,
    variables: { id: input.productId, publicationId: input.publicationId },
    root: "product",
    notFoundMessage: `No product found with ID ${input.productId}.`,
    select: (product) => ({
      id: product.id,
      title: product.title,
      published: product.publishedOnPublication,
    }),
  });
}
