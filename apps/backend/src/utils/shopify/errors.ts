import { badGateway, gatewayTimeout, isBoom, type Boom } from "@hapi/boom";

import { isRecord } from "./utils";

/**
 * Data attached to the Boom errors the dispatcher throws. `transport` covers
 * network failures, timeouts and non-2xx statuses; `decode` is a 2xx body that
 * is not a JSON object.
 */
export type ShopifyDispatchErrorData =
  | { kind: "transport"; status?: number; body?: string }
  | { kind: "decode"; body: string };

const withCause = <T>(error: Boom<T>, cause: unknown): Boom<T> => {
  if (cause !== undefined) {
    error.cause = cause;
  }
  return error;
};

export function shopifyTransportError(
  message: string,
  cause?: unknown
): Boom<ShopifyDispatchErrorData> {
  return withCause(
    badGateway<ShopifyDispatchErrorData>(message, { kind: "transport" }),
    cause
  );
}

export function shopifyResponseError(
  status: number,
  statusText: string,
  body: string
): Boom<ShopifyDispatchErrorData> {
  const reason = statusText ? `${status} ${statusText}` : String(status);
  return badGateway<ShopifyDispatchErrorData>(`Shopify API error: ${reason}`, {
    kind: "transport",
    status,
    body,
  });
}

export function shopifyTimeoutError(
  timeoutMs: number,
  cause?: unknown
): Boom<ShopifyDispatchErrorData> {
  return withCause(
    gatewayTimeout<ShopifyDispatchErrorData>(
      `Shopify API request timeout after ${timeoutMs}ms`,
      { kind: "transport" }
    ),
    cause
  );
}

export function shopifyDecodeError(
  message: string,
  body: string,
  cause?: unknown
): Boom<ShopifyDispatchErrorData> {
  return withCause(
    badGateway<ShopifyDispatchErrorData>(message, { kind: "decode", body }),
    cause
  );
}

/** The dispatcher data carried by a Boom error, or undefined for anything else */
export function getShopifyDispatchErrorData(
  error: unknown
): ShopifyDispatchErrorData | undefined {
  if (!isBoom(error)) {
    return undefined;
  }
  const data: unknown = error.data;
  if (!isRecord(data)) {
    return undefined;
  }
  if (data.kind === "decode") {
    return {
      kind: "decode",
      body: typeof data.body === "string" ? data.body : "",
    };
  }
  if (data.kind === "transport") {
    return {
      kind: "transport",
      status: typeof data.status === "number" ? data.status : undefined,
      body: typeof data.body === "string" ? data.body : undefined,
    };
  }
  return undefined;
}
