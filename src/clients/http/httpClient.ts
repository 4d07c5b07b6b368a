/**
 * fetch wrapper shared by the ingestion client and the HTTP renderer
 *
 * Per-attempt timeout linked to the caller's AbortSignal, retries with
 * backoff for idempotent methods, HttpError for non-2xx responses, JSON or
 * text bodies.
 */

import type { HttpMethod, HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  ERROR_SNIPPET_LENGTH,
  HTTP_DEFAULTS,
  IDEMPOTENT_HTTP_METHODS,
  JSON_REQUEST_HEADERS,
  RETRY_AFTER_STATUS_CODES,
  TRANSIENT_STATUS_CODES,
} from "@/constants";
import * as logger from "@/logger";

async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_SNIPPET_LENGTH ? `${text.slice(0, ERROR_SNIPPET_LENGTH)}...` : text;
  } catch {
    return undefined;
  }
}

/**
 * Transient failures: network errors, timeouts and retryable status codes
 *
 * Independent of the method; callers decide whether a failure may be retried.
 */
export function isTransientHttpError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return TRANSIENT_STATUS_CODES.has(error.status);
  }
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TimeoutError" || error.name === "TypeError";
  }
  return false;
}

function isErrorRetryable(error: unknown, method: HttpMethod): boolean {
  return IDEMPOTENT_HTTP_METHODS.has(method) && isTransientHttpError(error);
}

/**
 * Parse Retry-After header (delay-seconds or HTTP-date) into milliseconds
 */
function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Exponential backoff with jitter:
 * min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
  retryAfterHeader: string | null,
): number {
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  if (retryAfterMs !== null) {
    return Math.min(retryAfterMs, maxRetryAfterMs);
  }
  return computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
}

/**
 * Sleep that resolves early (without throwing) when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

async function performRequest<T>(req: HttpRequest, timeoutMs: number): Promise<T> {
  const url = req.url;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onExternalAbort = (): void => controller.abort();
  req.signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, JSON_REQUEST_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };
    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    if (response.status === 204) {
      return undefined as T;
    }

    if (req.responseType === "text") {
      const text = await response.text();
      return text as unknown as T;
    }

    const contentType = response.headers.get("content-type");
    const isJson =
      contentType !== null && (contentType.includes("application/json") || contentType.includes("+json"));

    if (!isJson) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url,
        status: response.status,
        contentType: contentType ?? "none",
      });
      // Text fallback; caller validates the shape
      const text = await response.text();
      return text as unknown as T;
    }

    try {
      const data: unknown = await response.json();
      return data as T;
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        status: response.status,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      return undefined as T;
    }
  } finally {
    clearTimeout(timeoutId);
    req.signal?.removeEventListener("abort", onExternalAbort);
  }
}

/**
 * Perform an HTTP request with timeout, retries and error handling
 *
 * GET and HEAD are retried on network errors, timeouts and transient
 * statuses (Retry-After honoured on 429/503). Other methods get one attempt.
 *
 * An aborted `req.signal` stops further attempts; the last error is thrown.
 *
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? HTTP_DEFAULTS.timeoutMs;
  const { maxAttempts, baseDelayMs, maxDelayMs, maxRetryAfterMs } = { ...HTTP_DEFAULTS, ...req.retry };

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest<T>(req, timeoutMs);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || req.signal?.aborted) {
        break;
      }

      if (!isErrorRetryable(error, req.method)) {
        throw error;
      }

      const retryAfterHeader =
        error instanceof HttpError && RETRY_AFTER_STATUS_CODES.has(error.status)
          ? error.headers?.get("retry-after") ?? null
          : null;

      const delayMs = computeRetryDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
        retryAfterHeader,
      );

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason: error instanceof HttpError ? `status ${error.status}` : error instanceof Error ? error.name : "unknown",
      });

      await sleep(delayMs, req.signal);
    }
  }

  throw lastError;
}
