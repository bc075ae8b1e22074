import { z } from "zod";

type ToolValidationResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

type SchemaNode = z.core.$ZodType;

const normalizeKeyName = (key: string): string =>
  key.toLowerCase().replace(/[_-]/g, "");

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const unwrapSchema = (schema: SchemaNode): SchemaNode => {
  let current = schema;
  while (true) {
    if (
      current instanceof z.ZodOptional ||
      current instanceof z.ZodNullable ||
      current instanceof z.ZodDefault
    ) {
      current = current.unwrap();
      continue;
    }
    if (current instanceof z.ZodLazy) {
      current = current.unwrap();
      continue;
    }
    return current;
  }
};

/**
 * Rewrites keys that differ from the schema only by case, `_` or `-`
 * (`blog_id`, `BlogId`) to the declared key. A declared key wins over a
 * variant when both are present.
 */
const normalizeValue = (schema: SchemaNode, value: unknown): unknown => {
  const unwrapped = unwrapSchema(schema);

  if (unwrapped instanceof z.ZodObject) {
    if (!isPlainObject(value)) {
      return value;
    }
    const shape: Record<string, SchemaNode> = unwrapped.shape;
    const canonicalKeys = new Map<string, string>();
    for (const key of Object.keys(shape)) {
      canonicalKeys.set(normalizeKeyName(key), key);
    }

    const result: Record<string, unknown> = {};
    for (const [key, currentValue] of Object.entries(value)) {
      if (Object.prototype.hasOwnProperty.call(shape, key)) {
        result[key] = normalizeValue(shape[key], currentValue);
        continue;
      }
      const canonical = canonicalKeys.get(normalizeKeyName(key));
      if (canonical) {
        const hasCanonical =
          Object.prototype.hasOwnProperty.call(value, canonical) ||
          Object.prototype.hasOwnProperty.call(result, canonical);
        if (!hasCanonical) {
          result[canonical] = normalizeValue(shape[canonical], currentValue);
        }
        continue;
      }
      result[key] = currentValue;
    }
    return result;
  }

  if (unwrapped instanceof z.ZodArray) {
    if (!Array.isArray(value)) {
      return value;
    }
    const element = unwrapped.element;
    return value.map((item) => normalizeValue(element, item));
  }

  if (unwrapped instanceof z.ZodRecord) {
    if (!isPlainObject(value)) {
      return value;
    }
    const valueType = unwrapped.valueType;
    const result: Record<string, unknown> = {};
    for (const [key, currentValue] of Object.entries(value)) {
      result[key] = normalizeValue(valueType, currentValue);
    }
    return result;
  }

  if (unwrapped instanceof z.ZodUnion) {
    for (const option of unwrapped.options) {
      const normalized = normalizeValue(option, value);
      if (z.safeParse(option, normalized).success) {
        return normalized;
      }
    }
    return value;
  }

  return value;
};

const formatPath = (path: ReadonlyArray<PropertyKey>): string => {
  if (!path.length) {
    return "value";
  }
  return path.map((part) => String(part)).join(".");
};

const formatIssue = (issue: z.core.$ZodIssue): string => {
  if (issue.code === "unrecognized_keys") {
    return `Unknown field(s): ${issue.keys.join(", ")}.`;
  }

  const path = formatPath(issue.path);

  switch (issue.code) {
    case "invalid_type":
      if (issue.input === undefined) {
        return `Missing required field "${path}".`;
      }
      return `Invalid type for "${path}": expected ${issue.expected}.`;
    case "invalid_value":
      return `Invalid value for "${path}": expected one of ${issue.values
        .map((value) => String(value))
        .join(", ")}.`;
    case "too_small":
      return `Value for "${path}" is too small: ${issue.message}`;
    case "too_big":
      return `Value for "${path}" is too large: ${issue.message}`;
    default:
      return `Invalid value for "${path}": ${issue.message}.`;
  }
};

export const formatToolValidationError = (error: z.ZodError): string => {
  const messages = error.issues.map(formatIssue).join(" ");
  return `Error: Invalid tool arguments. ${messages}`;
};

export const validateToolArgs = <TSchema extends z.ZodType>(
  schema: TSchema,
  args: unknown
): ToolValidationResult<z.output<TSchema>> => {
  const normalizedArgs = normalizeValue(schema, args ?? {});
  const parsed = schema.safeParse(normalizedArgs, { reportInput: true });
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }
  return { ok: false, error: formatToolValidationError(parsed.error) };
};
