import { isBoom } from "@hapi/boom";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildShopifyGraphqlEndpoint, createShopifyClient } from "../client";
import type { ShopifyConfig } from "../config";
import { getShopifyDispatchErrorData } from "../errors";
import { getShopInfo } from "../store";

const config: ShopifyConfig = {
  storeDomain: "test-store.myshopify.com",
  accessToken: "test-token",
  apiVersion: "2025-01",
};

const SHOP_QUERY = "query { shop { name } }";

describe("shopify client", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds the versioned Admin API endpoint", () => {
    expect(buildShopifyGraphqlEndpoint(config)).toBe(
      "https://test-store.myshopify.com/admin/api/2025-01/graphql.json"
    );
  });

  it("posts the query and variables with the access token header", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ data: { shop: { name: "Test" } } }), {
        status: 200,
      })
    );
    const client = createShopifyClient(config);

    const response = await client.request(SHOP_QUERY, { first: 3 });

    expect(response).toEqual({ data: { shop: { name: "Test" } } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      "https://test-store.myshopify.com/admin/api/2025-01/graphql.json"
    );
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Accept: "application/json",
      "X-Shopify-Access-Token": "test-token",
    });
    expect(JSON.parse(init.body)).toEqual({
      query: SHOP_QUERY,
      variables: { first: 3 },
    });
  });

  it("omits variables when none are given", async () => {
    fetchMock.mockImplementation(
      async () => new Response(JSON.stringify({ data: {} }), { status: 200 })
    );
    const client = createShopifyClient(config);

    await client.request(SHOP_QUERY);
    await client.request(SHOP_QUERY, {});

    for (const [, init] of fetchMock.mock.calls) {
      expect(JSON.parse(init.body)).toEqual({ query: SHOP_QUERY });
    }
  });

  it("returns GraphQL errors in the envelope without throwing", async () => {
    fetchMock.mockResolvedValue(
      new Response(
        JSON.stringify({ errors: [{ message: "Field 'nope' doesn't exist" }] }),
        { status: 200 }
      )
    );
    const client = createShopifyClient(config);

    await expect(client.request(SHOP_QUERY)).resolves.toEqual({
      errors: [{ message: "Field 'nope' doesn't exist" }],
    });
  });

  it("rejects a blank query before sending anything", async () => {
    const client = createShopifyClient(config);

    await expect(client.request("   ")).rejects.toThrow(
      "GraphQL query must be a non-empty string"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("throws a transport error carrying status and body for non-2xx responses", async () => {
    fetchMock.mockResolvedValue(
      new Response('{"errors":"[API] Invalid API key or access token"}', {
        status: 401,
        statusText: "Unauthorized",
      })
    );
    const client = createShopifyClient(config);

    const error = await client.request(SHOP_QUERY).catch((e: unknown) => e);

    expect(isBoom(error)).toBe(true);
    expect(error).toMatchObject({
      message: "Shopify API error: 401 Unauthorized",
      output: { statusCode: 502 },
    });
    expect(getShopifyDispatchErrorData(error)).toEqual({
      kind: "transport",
      status: 401,
      body: '{"errors":"[API] Invalid API key or access token"}',
    });
  });

  it("throws a decode error when a 2xx body is not JSON", async () => {
    fetchMock.mockResolvedValue(
      new Response("<html>maintenance</html>", { status: 200 })
    );
    const client = createShopifyClient(config);

    const error = await client.request(SHOP_QUERY).catch((e: unknown) => e);

    expect(error).toMatchObject({
      message: "Shopify API returned a response that is not valid JSON",
    });
    expect(getShopifyDispatchErrorData(error)).toEqual({
      kind: "decode",
      body: "<html>maintenance</html>",
    });
  });

  it("throws a decode error when the JSON is not an object", async () => {
    fetchMock.mockResolvedValue(new Response("[1,2]", { status: 200 }));
    const client = createShopifyClient(config);

    await expect(client.request(SHOP_QUERY)).rejects.toThrow(
      "Shopify API returned JSON that is not a GraphQL response object"
    );
  });

  it("wraps network failures in a transport error", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const client = createShopifyClient(config);

    const error = await client.request(SHOP_QUERY).catch((e: unknown) => e);

    expect(error).toMatchObject({
      message: "Shopify API request failed: fetch failed",
      output: { statusCode: 502 },
    });
    expect(getShopifyDispatchErrorData(error)).toEqual({ kind: "transport" });
  });

  it("aborts requests that exceed the timeout", async () => {
    fetchMock.mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => {
            const abortError = new Error("This operation was aborted");
            abortError.name = "AbortError";
            reject(abortError);
          });
        })
    );
    const client = createShopifyClient(config, { requestTimeoutMs: 5 });

    const error = await client.request(SHOP_QUERY).catch((e: unknown) => e);

    expect(error).toMatchObject({
      message: "Shopify API request timeout after 5ms",
      output: { statusCode: 504 },
    });
    expect(getShopifyDispatchErrorData(error)).toEqual({ kind: "transport" });
  });
});

describe("shopify client failures seen by operations", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("reports a non-JSON 2xx body as a decode error", async () => {
    fetchMock.mockResolvedValue(
      new Response("<html>oops</html>", { status: 200 })
    );

    const result = await getShopInfo(createShopifyClient(config));

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "decode_error",
        message: "Shopify API returned a response that is not valid JSON",
        body: "<html>oops</html>",
      },
    });
  });

  it("keeps the status and body of a non-2xx response", async () => {
    fetchMock.mockResolvedValue(
      new Response("upstream down", {
        status: 503,
        statusText: "Service Unavailable",
      })
    );

    const result = await getShopInfo(createShopifyClient(config));

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "transport_error",
        message: "Shopify API error: 503 Service Unavailable",
        statusCode: 503,
        body: "upstream down",
      },
    });
  });
});
