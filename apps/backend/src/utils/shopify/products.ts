import type { ShopifyGraphqlClient } from "./client";
import {
  compactVariables,
  runShopifyOperation,
  type ShopifyOperationResult,
} from "./operation";
import type {
  ShopifyEdgeConnection,
  ShopifyNodeConnection,
  ShopifyPayload,
  ShopifyUserError,
} from "./types";

export interface ProductVariantSummary {
  title: string;
  price: string;
  sku: string | null;
}

export interface ProductSummary {
  id: string;
  title: string;
  handle: string;
  status: string;
  totalInventory: number | null;
  variants: ProductVariantSummary[];
}

export interface ProductMetafield {
  namespace: string;
  key: string;
  value: string;
}

export interface ProductDetail {
  id: string;
  title: string;
  handle: string;
  descriptionHtml: string;
  metafields: ProductMetafield[];
}

export interface ProductMedia {
  alt: string | null;
  mediaContentType: string;
  previewStatus: string | null;
}

export interface ProductOptionInput {
  name: string;
  /** Plain strings are wrapped as `{ name }` before sending */
  values?: Array<string | { name: string }>;
  position?: number;
}

/**
 * Fields of Shopify's ProductInput used when creating a product; anything
 * else the API accepts passes through untouched.
 */
export interface ProductCreateInput extends ShopifyPayload {
  title: string;
  descriptionHtml?: string;
  handle?: string;
  productType?: string;
  vendor?: string;
  status?: "ACTIVE" | "ARCHIVED" | "DRAFT";
  tags?: string[];
  productOptions?: ProductOptionInput[];
  metafields?: ShopifyPayload[];
}

export interface ProductUpdateInput extends ShopifyPayload {
  id: string;
  title?: string;
  descriptionHtml?: string;
  handle?: string;
  productType?: string;
  vendor?: string;
  status?: "ACTIVE" | "ARCHIVED" | "DRAFT";
  tags?: string[];
  metafields?: ShopifyPayload[];
}

export interface ProductVariantInput extends ShopifyPayload {
  price?: string | number;
  compareAtPrice?: string | number;
  optionValues?: Array<{
    name: string;
    optionId?: string;
    optionName?: string;
  }>;
  inventoryQuantities?: Array<{
    availableQuantity: number;
    locationId: string;
  }>;
  inventoryItem?: { sku?: string; tracked?: boolean };
  barcode?: string;
  taxable?: boolean;
  inventoryPolicy?: "DENY" | "CONTINUE";
  metafields?: ShopifyPayload[];
}

export type ProductVariantsBulkCreateStrategy =
  | "DEFAULT"
  | "REMOVE_STANDALONE_VARIANT"
  | "PRESERVE_STANDALONE_VARIANT";

const GET_PRODUCTS_QUERY = `
  query GetProducts($first: Int!) {
    products(first: $first) {
      edges {
        node {
          id
          title
          handle
          status
          totalInventory
          variants(first: 3) {
            edges {
              node {
                title
                price
                sku
              }
            }
          }
        }
      }
    }
  }
`;

const GET_PRODUCT_QUERY = `
  query GetProduct($id: ID!) {
    product(id: $id) {
      id
      title
      descriptionHtml
      handle
      metafields(first: 5) {
        edges {
          node {
            namespace
            key
            value
          }
        }
      }
    }
  }
`;

const CREATE_PRODUCT_MUTATION = `
  mutation ProductCreate($input: ProductInput!, $media: [CreateMediaInput!]) {
    productCreate(input: $input, media: $media) {
      product {
        id
        title
      }
      userErrors {
        field
        message
      }
    }
  }
`;

const UPDATE_PRODUCT_MUTATION = `
  mutation ProductUpdate($product: ProductUpdateInput!, $media: [CreateMediaInput!]) {
    productUpdate(product: $product, media: $media) {
      product {
        id
        title
        media(first: 10) {
          nodes {
            alt
            mediaContentType
            preview {
              status
            }
          }
        }
      }
      userErrors {
        field
        message
      }
    }
  }
`;

const DELETE_PRODUCT_MUTATION = `
  mutation ProductDelete($input: ProductDeleteInput!, $synchronous: Boolean) {
    productDelete(input: $input, synchronous: $synchronous) {
      deletedProductId
      userErrors {
        field
        message
      }
    }
  }
`;

const CREATE_PRODUCT_VARIANTS_MUTATION = `
  mutation ProductVariantsBulkCreate(
    $productId: ID!
    $variants: [ProductVariantsBulkInput!]!
    $media: [CreateMediaInput!]
    $strategy: ProductVariantsBulkCreateStrategy
  ) {
    productVariantsBulkCreate(
      productId: $productId
      variants: $variants
      media: $media
      strategy: $strategy
    ) {
      productVariants {
        id
        title
        price
      }
      userErrors {
        field
        message
      }
    }
  }
`;

type ProductNode = Omit<ProductSummary, "variants"> & {
  variants: ShopifyEdgeConnection<ProductVariantSummary>;
};

export async function getProducts(
  client: ShopifyGraphqlClient,
  options: { first?: number } = {}
): Promise<ShopifyOperationResult<ProductSummary[]>> {
  return runShopifyOperation<
    { products: ShopifyEdgeConnection<ProductNode> },
    "products",
    ProductSummary[]
  >(client, {
    operation: "getProducts",
    query: GET_PRODUCTS_QUERY,
    variables: { first: options.first ?? 3 },
    root: "products",
    select: (products) =>
      products.edges.map(({ node }) => ({
        id: node.id,
        title: node.title,
        handle: node.handle,
        status: node.status,
        totalInventory: node.totalInventory ?? null,
        variants: (node.variants?.edges ?? []).map((edge) => edge.node),
      })),
  });
}

export async function getProduct(
  client: ShopifyGraphqlClient,
  productId: string
): Promise<ShopifyOperationResult<ProductDetail>> {
  return runShopifyOperation<
    {
      product:
        | (Omit<ProductDetail, "metafields"> & {
            metafields?: ShopifyEdgeConnection<ProductMetafield>;
          })
        | null;
    },
    "product",
    ProductDetail
  >(client, {
    operation: "getProduct",
    query: GET_PRODUCT_QUERY,
    variables: { id: productId },
    root: "product",
    notFoundMessage: `No product found with ID ${productId}.`,
    select: (product) => ({
      id: product.id,
      title: product.title,
      handle: product.handle,
      descriptionHtml: product.descriptionHtml,
      metafields: (product.metafields?.edges ?? []).map((edge) => edge.node),
    }),
  });
}

/**
 * productCreate expects option values as `{ name }` objects; callers may pass
 * plain strings.
 */
export function normalizeProductOptions(
  options: ProductOptionInput[]
): Array<Omit<ProductOptionInput, "values"> & { values?: Array<{ name: string }> }> {
  return options.map((option) => {
    if (!option.values) {
      return { ...option, values: undefined };
    }
    return {
      ...option,
      values: option.values.map((value) =>
        typeof value === "string" ? { name: value } : value
      ),
    };
  });
}

export async function createProduct(
  client: ShopifyGraphqlClient,
  input: { product: ProductCreateInput; media?: ShopifyPayload[] }
): Promise<ShopifyOperationResult<{ id: string; title: string }>> {
  const product: ShopifyPayload = { ...input.product };
  if (input.product.productOptions) {
    product.productOptions = normalizeProductOptions(
      input.product.productOptions
    ).map((option) => compactVariables(option));
  }

  return runShopifyOperation<
    {
      productCreate: {
        product: { id: string; title: string } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "productCreate",
    { id: string; title: string }
  >(client, {
    operation: "createProduct",
    query: CREATE_PRODUCT_MUTATION,
    variables: compactVariables({ input: product, media: input.media }),
    root: "productCreate",
    select: (payload) => payload.product ?? undefined,
  });
}

export async function updateProduct(
  client: ShopifyGraphqlClient,
  input: { product: ProductUpdateInput; media?: ShopifyPayload[] }
): Promise<
  ShopifyOperationResult<{ id: string; title: string; media: ProductMedia[] }>
> {
  return runShopifyOperation<
    {
      productUpdate: {
        product: {
          id: string;
          title: string;
          media?: ShopifyNodeConnection<{
            alt: string | null;
            mediaContentType: string;
            preview: { status: string } | null;
          }>;
        } | null;
        userErrors: ShopifyUserError[];
      };
    },
    "productUpdate",
    { id: string; title: string; media: ProductMedia[] }
  >(client, {
    operation: "updateProduct",
    query: UPDATE_PRODUCT_MUTATION,
    variables: compactVariables({ product: input.product, media: input.media }),
    root: "productUpdate",
    select: ({ product }) =>
      product
        ? {
            id: product.id,
            title: product.title,
            media: (product.media?.nodes ?? []).map((media) => ({
              alt: media.alt,
              mediaContentType: media.mediaContentType,
              previewStatus: media.preview?.status ?? null,
            })),
          }
        : undefined,
  });
}

export async function deleteProduct(
  client: ShopifyGraphqlClient,
  input: { productId: string; synchronous?: boolean }
): Promise<ShopifyOperationResult<{ deletedProductId: string | null }>> {
  return runShopifyOperation<
    {
      productDelete: {
        deletedProductId: string | null;
        userErrors: ShopifyUserError[];
      };
    },
    "productDelete",
    { deletedProductId: string | null }
  >(client, {
    operation: "deleteProduct",
    query: DELETE_PRODUCT_MUTATION,
    variables: {
      input: { id: input.productId },
      synchronous: input.synchronous ?? true,
    },
    root: "productDelete",
    select: (payload) => ({
      deletedProductId: payload.deletedProductId ?? null,
    }),
  });
}

/**
 * Create variants in one bulk mutation. Shopify validates the batch as a
 * whole, so one invalid variant fails every variant.
 */
export async function createProductVariants(
  client: ShopifyGraphqlClient,
  input: {
    productId: string;
    variants: ProductVariantInput[];
    media?: ShopifyPayload[];
    strategy?: ProductVariantsBulkCreateStrategy;
  }
): Promise<ShopifyOperationResult<string[]>> {
  return runShopifyOperation<
    {
      productVariantsBulkCreate: {
        productVariants: Array<{ id: string; title: string; price: string }> | null;
        userErrors: ShopifyUserError[];
      };
    },
    "productVariantsBulkCreate",
    string[]
  >(client, {
    operation: "createProductVariants",
    query: CREATE_PRODUCT_VARIANTS_MUTATION,
    variables: compactVariables({
      productId: input.productId,
      variants: input.variants,
      media: input.media,
      strategy: input.strategy,
    }),
    root: "productVariantsBulkCreate",
    select: ({ productVariants }) =>
      productVariants ? productVariants.map((variant) => variant.id) : undefined,
  });
}
