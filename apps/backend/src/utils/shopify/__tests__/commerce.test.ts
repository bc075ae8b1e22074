import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ShopifyGraphqlClient } from "../client";
import {
  countCustomers,
  getCustomer,
  listCustomers,
  sendCustomerInvite,
} from "../customers";
import {
  deleteDiscountCode,
  getDiscountCode,
  listDiscountCodes,
} from "../discountCodes";
import { countOrders, listOrders } from "../orders";

describe("shopify customers, orders and discounts", () => {
  const request = vi.fn();
  const client: ShopifyGraphqlClient = { request };

  beforeEach(() => {
    request.mockReset();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists customers with only the variables that were set", async () => {
    const connection = {
      edges: [],
      pageInfo: { hasNextPage: false, endCursor: null },
    };
    request.mockResolvedValue({ data: { customers: connection } });

    const result = await listCustomers(client, { query: "tag:vip" });

    expect(request.mock.calls[0][1]).toEqual({ first: 10, query: "tag:vip" });
    expect(result).toEqual({ ok: true, data: connection });
  });

  it("passes cursor and sort key through", async () => {
    request.mockResolvedValue({ data: { customers: { edges: [] } } });

    await listCustomers(client, {
      first: 25,
      after: "cursor-1",
      sortKey: "UPDATED_AT",
    });

    expect(request.mock.calls[0][1]).toEqual({
      first: 25,
      after: "cursor-1",
      sortKey: "UPDATED_AT",
    });
  });

  it("counts customers with the default limit", async () => {
    request.mockResolvedValue({
      data: { customersCount: { count: 42, precision: "EXACT" } },
    });

    const result = await countCustomers(client);

    expect(request.mock.calls[0][1]).toEqual({ limit: 10000 });
    expect(result).toEqual({ ok: true, data: { count: 42, precision: "EXACT" } });
  });

  it("treats a count without a number as malformed", async () => {
    request.mockResolvedValue({ data: { customersCount: { precision: "EXACT" } } });

    const result = await countCustomers(client);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("malformed_response");
    }
  });

  it("reports an unknown customer as not found", async () => {
    request.mockResolvedValue({ data: { customer: null } });

    await expect(
      getCustomer(client, "gid://shopify/Customer/404")
    ).resolves.toEqual({
      ok: false,
      error: {
        kind: "not_found",
        message: "Customer not found for ID: gid://shopify/Customer/404",
      },
    });
  });

  it("sends an account invite", async () => {
    request.mockResolvedValue({
      data: {
        customerSendAccountInviteEmail: {
          customer: { id: "gid://shopify/Customer/1" },
          userErrors: [],
        },
      },
    });

    const result = await sendCustomerInvite(client, "gid://shopify/Customer/1");

    expect(request.mock.calls[0][1]).toEqual({
      customerId: "gid://shopify/Customer/1",
    });
    expect(result).toEqual({
      ok: true,
      data: { customerId: "gid://shopify/Customer/1" },
    });
  });

  it("rejects an invite for a disabled customer with the user error", async () => {
    request.mockResolvedValue({
      data: {
        customerSendAccountInviteEmail: {
          customer: null,
          userErrors: [
            { field: ["customerId"], message: "Customer account is disabled" },
          ],
        },
      },
    });

    const result = await sendCustomerInvite(client, "gid://shopify/Customer/2");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("validation_error");
    }
  });

  it("lists and counts orders", async () => {
    request
      .mockResolvedValueOnce({ data: { orders: { edges: [] } } })
      .mockResolvedValueOnce({
        data: { ordersCount: { count: 10000, precision: "AT_LEAST" } },
      });

    const listed = await listOrders(client, { sortKey: "CREATED_AT" });
    const counted = await countOrders(client, {
      query: "financial_status:paid",
      limit: 500,
    });

    expect(request.mock.calls[0][1]).toEqual({ first: 10, sortKey: "CREATED_AT" });
    expect(request.mock.calls[1][1]).toEqual({
      query: "financial_status:paid",
      limit: 500,
    });
    expect(listed).toEqual({ ok: true, data: { edges: [] } });
    expect(counted).toEqual({
      ok: true,
      data: { count: 10000, precision: "AT_LEAST" },
    });
  });

  it("lists discount code nodes", async () => {
    const nodes = {
      nodes: [
        {
          id: "gid://shopify/DiscountCodeNode/1",
          codeDiscount: { title: "SPRING10", summary: "10% off" },
        },
        { id: "gid://shopify/DiscountCodeNode/2", codeDiscount: {} },
      ],
      pageInfo: { hasNextPage: true, endCursor: "abc" },
    };
    request.mockResolvedValue({ data: { codeDiscountNodes: nodes } });

    const result = await listDiscountCodes(client, { first: 2 });

    expect(request.mock.calls[0][1]).toEqual({ first: 2 });
    expect(result).toEqual({ ok: true, data: nodes });
  });

  it("reports an unknown discount code as not found", async () => {
    request.mockResolvedValue({ data: { codeDiscountNode: null } });

    await expect(
      getDiscountCode(client, "gid://shopify/DiscountCodeNode/9")
    ).resolves.toEqual({
      ok: false,
      error: {
        kind: "not_found",
        message: "Discount code not found for ID: gid://shopify/DiscountCodeNode/9",
      },
    });
  });

  it("keeps user error codes from discount deletion", async () => {
    request.mockResolvedValue({
      data: {
        discountCodeDelete: {
          deletedCodeDiscountId: null,
          userErrors: [
            { field: ["id"], message: "Discount does not exist", code: "INVALID" },
          ],
        },
      },
    });

    const result = await deleteDiscountCode(
      client,
      "gid://shopify/DiscountCodeNode/9"
    );

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "validation_error",
        message: "Shopify rejected deleteDiscountCode with 1 error(s)",
        userErrors: [
          { field: ["id"], message: "Discount does not exist", code: "INVALID" },
        ],
      },
    });
  });
});
