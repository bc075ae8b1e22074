import type { ShopifyGraphqlClient } from "./client";
import { getShopifyDispatchErrorData } from "./errors";
import type {
  ShopifyGraphqlResponse,
  ShopifyUserError,
  ShopifyVariables,
} from "./types";
import { isRecord } from "./utils";

export type ShopifyOperationError =
  | {
      kind: "transport_error";
      message: string;
      statusCode?: number;
      body?: string;
    }
  | { kind: "decode_error"; message: string; body: string }
  | { kind: "request_error"; message: string; messages: string[] }
  | { kind: "malformed_response"; message: string; response: unknown }
  | {
      kind: "validation_error";
      message: string;
      userErrors: ShopifyUserError[];
    }
  | { kind: "not_found"; message: string };

export type ShopifyOperationResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: ShopifyOperationError };

export interface ShopifyOperationDefinition<
  TData extends object,
  K extends keyof TData & string,
  TResult,
> {
  /** Name used in logs */
  operation: string;
  query: string;
  variables?: ShopifyVariables;
  /** Field under `data` holding this operation's payload */
  root: K;
  /**
   * Reshape the payload. Returning undefined means a field the operation
   * relies on is absent, which is reported as a malformed response.
   */
  select: (payload: NonNullable<TData[K]>) => TResult | undefined;
  /** When set, a null payload is reported as not_found with this message */
  notFoundMessage?: string;
  /**
   * Checked against `data` before the root is read; true reports not_found
   * with `notFoundMessage` even when the root key is absent or empty.
   */
  isNotFound?: (data: TData) => boolean;
}

/**
 * Drop optional variables that were left unset. Shopify treats an explicit
 * null differently from an absent field on several mutations.
 */
export function compactVariables(
  variables: Record<string, unknown>
): ShopifyVariables {
  const result: ShopifyVariables = {};
  for (const [key, value] of Object.entries(variables)) {
    if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }
  return result;
}

export function operationFailed<T>(
  operation: string,
  error: ShopifyOperationError
): ShopifyOperationResult<T> {
  console.error(`[Shopify] ${operation} failed:`, error);
  return { ok: false, error };
}

export function operationNotFound<T>(
  operation: string,
  message: string
): ShopifyOperationResult<T> {
  return operationFailed(operation, { kind: "not_found", message });
}

/**
 * Dispatch one query and reduce the envelope:
 * dispatcher failure, then top-level errors, then a missing payload,
 * then userErrors, then `select`.
 */
export async function runShopifyOperation<
  TData extends object,
  K extends keyof TData & string,
  TResult,
>(
  client: ShopifyGraphqlClient,
  definition: ShopifyOperationDefinition<TData, K, TResult>
): Promise<ShopifyOperationResult<TResult>> {
  const { operation, query, variables, root } = definition;

  let response: ShopifyGraphqlResponse<TData>;
  try {
    response = await client.request<TData>(query, variables);
  } catch (error) {
    return operationFailed(operation, toDispatchError(error));
  }

  const { errors } = response;
  if (
    errors !== undefined &&
    errors !== null &&
    !(Array.isArray(errors) && errors.length === 0)
  ) {
    // Shopify sends a bare string for auth failures
    const entries: unknown[] = Array.isArray(errors) ? errors : [errors];
    const messages = entries.map((error) => {
      if (typeof error === "string") {
        return error;
      }
      return isRecord(error) && typeof error.message === "string"
        ? error.message
        : JSON.stringify(error);
    });
    return operationFailed(operation, {
      kind: "request_error",
      message: `GraphQL error: ${messages[0]}`,
      messages,
    });
  }

  const data = response.data;
  if (data === undefined || data === null || typeof data !== "object") {
    return operationFailed(operation, {
      kind: "malformed_response",
      message: `Response is missing data.${root}`,
      response,
    });
  }

  if (definition.notFoundMessage && definition.isNotFound?.(data)) {
    return operationNotFound(operation, definition.notFoundMessage);
  }

  if (!Object.prototype.hasOwnProperty.call(data, root)) {
    return operationFailed(operation, {
      kind: "malformed_response",
      message: `Response is missing data.${root}`,
      response,
    });
  }

  const payload = data[root];
  if (payload === null || payload === undefined) {
    if (definition.notFoundMessage) {
      return operationNotFound(operation, definition.notFoundMessage);
    }
    return operationFailed(operation, {
      kind: "malformed_response",
      message: `data.${root} is null`,
      response,
    });
  }

  const userErrors = extractUserErrors(payload);
  if (userErrors.length > 0) {
    return operationFailed(operation, {
      kind: "validation_error",
      message: `Shopify rejected ${operation} with ${userErrors.length} error(s)`,
      userErrors,
    });
  }

  let selected: TResult | undefined;
  try {
    selected = definition.select(payload);
  } catch (error) {
    return operationFailed(operation, {
      kind: "malformed_response",
      message: `Unexpected shape under data.${root}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      response,
    });
  }

  if (selected === undefined) {
    return operationFailed(operation, {
      kind: "malformed_response",
      message: `Unexpected shape under data.${root}`,
      response,
    });
  }

  return { ok: true, data: selected };
}

function toDispatchError(error: unknown): ShopifyOperationError {
  const data = getShopifyDispatchErrorData(error);
  const message = error instanceof Error ? error.message : String(error);
  if (data?.kind === "decode") {
    return { kind: "decode_error", message, body: data.body };
  }
  return {
    kind: "transport_error",
    message,
    statusCode: data?.status,
    body: data?.body,
  };
}

function extractUserErrors(payload: unknown): ShopifyUserError[] {
  if (!isRecord(payload) || !Array.isArray(payload.userErrors)) {
    return [];
  }
  return payload.userErrors.map((entry: unknown): ShopifyUserError => {
    if (!isRecord(entry)) {
      return { field: null, message: String(entry) };
    }
    const field = Array.isArray(entry.field)
      ? entry.field.map((part: unknown) => String(part))
      : typeof entry.field === "string"
        ? [entry.field]
        : null;
    return {
      field,
      message:
        typeof entry.message === "string"
          ? entry.message
          : JSON.stringify(entry.message),
      ...(typeof entry.code === "string" ? { code: entry.code } : {}),
    };
  });
}
