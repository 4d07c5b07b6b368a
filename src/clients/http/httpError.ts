/**
 * Non-2xx response
 */

import type { HttpErrorDetails } from "@/types";

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    const snippet = details.bodySnippet ? ` - ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} - ${details.url}${snippet}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }

  /** 4xx other than 408/429: the request itself was refused */
  get isClientError(): boolean {
    return this.status >= 400 && this.status < 500 && this.status !== 408 && this.status !== 429;
  }
}
