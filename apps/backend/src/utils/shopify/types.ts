/**
 * Shapes exchanged with the Shopify Admin GraphQL API.
 * Only the fields the operations select are declared.
 */

export type ShopifyVariables = Record<string, unknown>;

export interface ShopifyGraphqlError {
  message: string;
  locations?: Array<{ line: number; column: number }>;
  path?: Array<string | number>;
  extensions?: Record<string, unknown>;
}

export interface ShopifyGraphqlResponse<TData> {
  data?: TData | null;
  errors?: ShopifyGraphqlError[] | string;
  extensions?: Record<string, unknown>;
}

export interface ShopifyUserError {
  field: string[] | null;
  message: string;
  code?: string | null;
}

export interface ShopifyPageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

export interface ShopifyEdge<TNode> {
  cursor?: string;
  node: TNode;
}

export interface ShopifyEdgeConnection<TNode> {
  edges: Array<ShopifyEdge<TNode>>;
  pageInfo?: ShopifyPageInfo;
}

export interface ShopifyNodeConnection<TNode> {
  nodes: TNode[];
  pageInfo?: ShopifyPageInfo;
}

export interface ShopifyMoney {
  amount: string;
  currencyCode: string;
}

export interface ShopifyCount {
  count: number;
  precision?: "EXACT" | "AT_LEAST";
}

/**
 * Open-ended sub-objects whose schema Shopify keeps extensible
 * (metafields, media inputs).
 */
export type ShopifyPayload = Record<string, unknown>;

export const MENU_ITEM_TYPES = [
  "ARTICLE",
  "BLOG",
  "CATALOG",
  "COLLECTION",
  "COLLECTIONS",
  "CUSTOMER_ACCOUNT_PAGE",
  "FRONTPAGE",
  "HTTP",
  "METAOBJECT",
  "PAGE",
  "PRODUCT",
  "SEARCH",
  "SHOP_POLICY",
] as const;

export type MenuItemType = (typeof MENU_ITEM_TYPES)[number];

export interface MenuItem {
  id?: string;
  title: string;
  type: string;
  url?: string | null;
  resourceId?: string | null;
  tags?: string[];
  items?: MenuItem[];
}

export interface MenuItemInput {
  id?: string;
  title: string;
  type: MenuItemType;
  url?: string;
  resourceId?: string;
  tags?: string[];
  items?: MenuItemInput[];
}
