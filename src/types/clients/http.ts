/**
 * Shared HTTP client types
 */

export type HttpMethod = "GET" | "HEAD" | "POST";

/**
 * Per-request overrides of HTTP_DEFAULTS
 */
export interface HttpRetryConfig {
  /** Attempts including the first; 1 disables retries */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  maxRetryAfterMs?: number;
}

/**
 * How the response body is read
 *
 * - json (default): parsed JSON; non-JSON bodies are returned as text
 * - text: raw body text (HTML pages)
 */
export type HttpResponseType = "json" | "text";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  responseType?: HttpResponseType;
  /** External cancellation; aborts the in-flight attempt and any retry wait */
  signal?: AbortSignal;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/** httpRequest, or a stand-in injected by tests */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;
