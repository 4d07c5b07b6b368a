/**
 * Shared HTTP client defaults
 */

import type { HttpMethod } from "@/types";

/** Per-attempt limits; a request's own `timeoutMs` / `retry` override them */
export const HTTP_DEFAULTS = {
  timeoutMs: 20_000,
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  /** Cap on a server-sent Retry-After */
  maxRetryAfterMs: 30_000,
} as const;

export const JSON_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/** Characters of an error response body kept in HttpError messages */
export const ERROR_SNIPPET_LENGTH = 300;

/** Only these are retried by the client itself; POST callers own their retries */
export const IDEMPOTENT_HTTP_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(["GET", "HEAD"]);

export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 425, 429, 500, 502, 503, 504]);

/** Statuses whose Retry-After header is honoured */
export const RETRY_AFTER_STATUS_CODES: ReadonlySet<number> = new Set([429, 503]);
