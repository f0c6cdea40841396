import { vi } from "vitest";

import type { FetchFn } from "../src/http/http-client";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * fetch stand-in answering every call with a fresh copy of the same body
 */
export function fetchReturning(body: unknown, status = 200) {
  return vi.fn<FetchFn>(() => Promise.resolve(jsonResponse(body, status)));
}

/**
 * URL of the n-th call made through a fetch stand-in
 */
export function calledUrl(fetchFn: ReturnType<typeof fetchReturning>, n = 0): string | undefined {
  return fetchFn.mock.calls[n]?.[0];
}
