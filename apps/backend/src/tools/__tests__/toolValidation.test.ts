import { describe, expect, it } from "vitest";
import { z } from "zod";

import { validateToolArgs } from "../toolValidation";

describe("validateToolArgs", () => {
  it("repairs snake_case, kebab-case and case-mismatched keys recursively", () => {
    const schema = z
      .object({
        blogId: z.string(),
        firstN: z.number().default(5),
        article: z
          .object({
            authorName: z.string(),
            tags: z.array(z.object({ tagName: z.string() }).strict()).optional(),
          })
          .strict(),
      })
      .strict();

    const parsed = validateToolArgs(schema, {
      blog_id: "gid://shopify/Blog/1",
      "first-n": 2,
      Article: {
        author_name: "Dana",
        tags: [{ TAG_NAME: "launch" }],
      },
    });

    expect(parsed).toEqual({
      ok: true,
      data: {
        blogId: "gid://shopify/Blog/1",
        firstN: 2,
        article: { authorName: "Dana", tags: [{ tagName: "launch" }] },
      },
    });
  });

  it("keeps canonical keys when a variant is also present", () => {
    const schema = z.object({ pageId: z.string() }).strict();

    const parsed = validateToolArgs(schema, {
      page_id: "ignored",
      pageId: "gid://shopify/Page/1",
    });

    expect(parsed).toEqual({ ok: true, data: { pageId: "gid://shopify/Page/1" } });
  });

  it("applies defaults when arguments are missing entirely", () => {
    const schema = z.object({ firstN: z.number().default(3) }).strict();

    expect(validateToolArgs(schema, undefined)).toEqual({
      ok: true,
      data: { firstN: 3 },
    });
  });

  it("repairs keys inside union members and record values", () => {
    const schema = z
      .object({
        values: z.array(z.union([z.string(), z.object({ optionName: z.string() }).strict()])),
        metadata: z.record(z.string(), z.object({ itemId: z.string() }).strict()),
      })
      .strict();

    const parsed = validateToolArgs(schema, {
      values: ["S", { option_name: "Size" }],
      metadata: { first_item: { item_id: "item-1" } },
    });

    expect(parsed).toEqual({
      ok: true,
      data: {
        values: ["S", { optionName: "Size" }],
        metadata: { first_item: { itemId: "item-1" } },
      },
    });
  });

  it("repairs keys through recursive schemas", () => {
    const node = z.strictObject({
      title: z.string(),
      get subItems(): z.ZodOptional<z.ZodArray<typeof node>> {
        return z.array(node).optional();
      },
    });

    const parsed = validateToolArgs(z.object({ items: z.array(node) }).strict(), {
      items: [{ title: "Shop", sub_items: [{ title: "Sale", sub_items: [] }] }],
    });

    expect(parsed).toEqual({
      ok: true,
      data: {
        items: [{ title: "Shop", subItems: [{ title: "Sale", subItems: [] }] }],
      },
    });
  });

  it("reports unknown fields", () => {
    const schema = z.object({ pageId: z.string() }).strict();

    expect(
      validateToolArgs(schema, { pageId: "gid://shopify/Page/1", mystery: 1 })
    ).toEqual({
      ok: false,
      error: "Error: Invalid tool arguments. Unknown field(s): mystery.",
    });
  });

  it("reports missing fields, wrong types and bad enum values", () => {
    const schema = z
      .object({
        blogId: z.string(),
        firstN: z.number(),
        commentPolicy: z.enum(["AUTO_PUBLISHED", "CLOSED", "MODERATED"]),
      })
      .strict();

    const parsed = validateToolArgs(schema, {
      firstN: "five",
      commentPolicy: "OPEN",
    });

    expect(parsed).toEqual({
      ok: false,
      error:
        'Error: Invalid tool arguments. Missing required field "blogId". ' +
        'Invalid type for "firstN": expected number. ' +
        'Invalid value for "commentPolicy": expected one of AUTO_PUBLISHED, CLOSED, MODERATED.',
    });
  });

  it("uses dotted paths for nested issues", () => {
    const schema = z
      .object({ product: z.object({ title: z.string().min(1) }).strict() })
      .strict();

    const parsed = validateToolArgs(schema, { product: { title: "" } });

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.startsWith(
        'Error: Invalid tool arguments. Value for "product.title" is too small: '
      )).toBe(true);
    }
  });
});
