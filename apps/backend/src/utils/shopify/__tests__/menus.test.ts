import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ShopifyGraphqlClient } from "../client";
import {
  getMenu,
  MAX_MENU_RENDER_DEPTH,
  renderMenuItems,
  updateMenu,
} from "../menus";
import type { MenuItem } from "../types";

const mainMenu = {
  id: "gid://shopify/Menu/1",
  title: "Main menu",
  handle: "main-menu",
  items: [
    {
      id: "gid://shopify/MenuItem/1",
      title: "Home",
      type: "FRONTPAGE",
      url: "/",
      resourceId: null,
      tags: [],
      items: [],
    },
  ],
};

describe("shopify menus", () => {
  const request = vi.fn();
  const client: ShopifyGraphqlClient = { request };

  beforeEach(() => {
    request.mockReset();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves the first menu ID and then loads that menu", async () => {
    request
      .mockResolvedValueOnce({
        data: { menus: { edges: [{ node: { id: "gid://shopify/Menu/1" } }] } },
      })
      .mockResolvedValueOnce({ data: { menu: mainMenu } });

    const result = await getMenu(client);

    expect(request).toHaveBeenCalledTimes(2);
    expect(request.mock.calls[0][1]).toBeUndefined();
    expect(request.mock.calls[1][1]).toEqual({ id: "gid://shopify/Menu/1" });
    expect(result).toEqual({ ok: true, data: mainMenu });
  });

  it("stops after the first request when the store has no menus", async () => {
    request.mockResolvedValue({ data: { menus: { edges: [] } } });

    const result = await getMenu(client);

    expect(request).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      ok: false,
      error: { kind: "not_found", message: "No menus found in the store." },
    });
  });

  it("passes through a failure of the first request", async () => {
    request.mockResolvedValue({ errors: [{ message: "Access denied" }] });

    const result = await getMenu(client);

    expect(request).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("request_error");
    }
  });

  it("reports a menu that vanished between the two requests", async () => {
    request
      .mockResolvedValueOnce({
        data: { menus: { edges: [{ node: { id: "gid://shopify/Menu/1" } }] } },
      })
      .mockResolvedValueOnce({ data: { menu: null } });

    const result = await getMenu(client);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "not_found",
        message: "Menu not found or could not be fetched.",
      },
    });
  });

  it.each([
    ["an absent menu key", {}],
    ["an empty menu object", { menu: {} }],
  ])("treats %s in the second response as not found", async (_label, data) => {
    request
      .mockResolvedValueOnce({
        data: { menus: { edges: [{ node: { id: "gid://shopify/Menu/1" } }] } },
      })
      .mockResolvedValueOnce({ data });

    const result = await getMenu(client);

    expect(request).toHaveBeenCalledTimes(2);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "not_found",
        message: "Menu not found or could not be fetched.",
      },
    });
  });

  it("sends the full item tree when updating", async () => {
    request.mockResolvedValue({
      data: { menuUpdate: { menu: mainMenu, userErrors: [] } },
    });
    const items = [
      {
        title: "Shop",
        type: "COLLECTION" as const,
        resourceId: "gid://shopify/Collection/1",
        items: [{ title: "Sale", type: "HTTP" as const, url: "/sale" }],
      },
    ];

    const result = await updateMenu(client, {
      menuId: "gid://shopify/Menu/1",
      title: "Main menu",
      handle: "main-menu",
      items,
    });

    expect(request.mock.calls[0][1]).toEqual({
      id: "gid://shopify/Menu/1",
      title: "Main menu",
      handle: "main-menu",
      items,
    });
    expect(result).toEqual({ ok: true, data: mainMenu });
  });
});

describe("renderMenuItems", () => {
  const nest = (depth: number): MenuItem[] => {
    let items: MenuItem[] = [];
    for (let level = depth - 1; level >= 0; level -= 1) {
      items = [{ title: `Level ${level}`, type: "HTTP", url: `/l${level}`, items }];
    }
    return items;
  };

  it("indents two spaces per level and falls back to N/A", () => {
    const items: MenuItem[] = [
      {
        title: "Home",
        type: "FRONTPAGE",
        url: "/",
        items: [{ title: "Blog", type: "BLOG", url: null }],
      },
      { title: "Contact", type: "PAGE", url: "" },
    ];

    expect(Array.from(renderMenuItems(items))).toEqual([
      "  - Home (FRONTPAGE): /",
      "    - Blog (BLOG): N/A",
      "  - Contact (PAGE): N/A",
    ]);
  });

  it("renders nothing for an empty menu", () => {
    expect(Array.from(renderMenuItems([]))).toEqual([]);
  });

  it("replaces levels past the depth cap with one truncation line", () => {
    const lines = Array.from(renderMenuItems(nest(MAX_MENU_RENDER_DEPTH + 3)));

    expect(lines).toHaveLength(MAX_MENU_RENDER_DEPTH + 1);
    expect(lines[MAX_MENU_RENDER_DEPTH - 1]).toBe(
      `${" ".repeat(2 * MAX_MENU_RENDER_DEPTH)}- Level ${
        MAX_MENU_RENDER_DEPTH - 1
      } (HTTP): /l${MAX_MENU_RENDER_DEPTH - 1}`
    );
    expect(lines[MAX_MENU_RENDER_DEPTH]).toBe(
      `${" ".repeat(2 * (MAX_MENU_RENDER_DEPTH + 1))}- … (nesting truncated)`
    );
  });

  it("renders exactly the cap depth without truncation", () => {
    const lines = Array.from(renderMenuItems(nest(MAX_MENU_RENDER_DEPTH)));

    expect(lines).toHaveLength(MAX_MENU_RENDER_DEPTH);
    expect(lines.some((line) => line.includes("nesting truncated"))).toBe(false);
  });
});
