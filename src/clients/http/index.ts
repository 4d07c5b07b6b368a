/**
 * HTTP client public API
 */

export { httpRequest, isTransientHttpError, computeBackoffDelay, sleep } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpRequestFn,
} from "@/types";
