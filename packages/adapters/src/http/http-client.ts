/**
 * JSON over HTTP with a per-request timeout and zod-validated responses
 *
 * Every venue adapter goes through `requestJson`, so transport failures,
 * HTTP status errors and malformed bodies arrive as one error union.
 */

import { Result, ResultAsync, err, ok } from "neverthrow";
import type { z } from "zod";

import type { ExecutionError, MarketDataError } from "../ports";

/**
 * Injectable fetch (tests pass a stand-in)
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpError =
  | { type: "network"; message: string }
  | { type: "timeout"; message: string }
  | { type: "http_status"; status: number; message: string }
  | { type: "invalid_response"; message: string };

export interface HttpClientOptions {
  fetchFn?: FetchFn;
  timeoutMs: number;
}

const BODY_PREVIEW_CHARS = 200;

function toTransportError(error: unknown): HttpError {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return { type: "timeout", message: error.message };
  }
  return { type: "network", message: error instanceof Error ? error.message : String(error) };
}

const parseJson = Result.fromThrowable(
  (body: string): unknown => JSON.parse(body),
  (error): HttpError => ({
    type: "invalid_response",
    message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
  }),
);

function decodeBody<T>(response: Response, body: string, schema: z.ZodType<T>): Result<T, HttpError> {
  if (!response.ok) {
    return err({
      type: "http_status",
      status: response.status,
      message: `HTTP ${String(response.status)}: ${body.slice(0, BODY_PREVIEW_CHARS)}`,
    });
  }

  return parseJson(body).andThen(json => {
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      return err<T, HttpError>({ type: "invalid_response", message: parsed.error.message });
    }
    return ok<T, HttpError>(parsed.data);
  });
}

/**
 * Perform a request and decode the JSON body with `schema`.
 * A caller `init.signal` aborts the request together with the per-request timeout.
 */
export function requestJson<T>(
  options: HttpClientOptions,
  url: string,
  schema: z.ZodType<T>,
  init: RequestInit = {},
): ResultAsync<T, HttpError> {
  const fetchFn = options.fetchFn ?? fetch;
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = init.signal ? AbortSignal.any([init.signal, timeout]) : timeout;

  return ResultAsync.fromPromise(
    fetchFn(url, { ...init, signal }),
    toTransportError,
  ).andThen(response =>
    ResultAsync.fromPromise(response.text(), toTransportError).andThen(body => decodeBody(response, body, schema)),
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Error mapping
// ─────────────────────────────────────────────────────────────────────────────

export function toMarketDataError(error: HttpError): MarketDataError {
  switch (error.type) {
    case "http_status":
      if (error.status === 429) return { type: "rate_limit", message: error.message };
      if (error.status === 404) return { type: "not_found", message: error.message };
      return { type: "network", message: error.message };
    default:
      return error;
  }
}

export function toExecutionError(error: HttpError): ExecutionError {
  switch (error.type) {
    case "http_status":
      if (error.status === 429) return { type: "rate_limit", message: error.message };
      if (error.status === 401 || error.status === 403) return { type: "auth", message: error.message };
      if (error.status === 400) return { type: "invalid_order", message: error.message };
      return { type: "exchange_error", message: error.message, code: String(error.status) };
    case "invalid_response":
      return { type: "unknown", message: error.message };
    default:
      return error;
  }
}
