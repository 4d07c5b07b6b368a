/**
 * HttpRenderer: Renderer over plain HTTP GET
 *
 * Fetches static markup through the shared HTTP client and derives visible
 * text with cheerio. Pages built client-side render as empty and surface
 * as RenderError("empty"); a browser-backed Renderer can be injected
 * instead.
 */

import type { HttpRequestFn, RenderedPage } from "@/types";
import type { Renderer } from "@/interfaces";
import { httpRequest, HttpError } from "@/clients/http";
import { RENDERER_HTTP_HEADERS, MIN_RENDERED_TEXT_LENGTH } from "@/constants";
import { errorMessage, htmlToText } from "@/utils";
import { RenderError } from "./renderError";

export class HttpRenderer implements Renderer {
  private readonly http: HttpRequestFn;

  constructor(http: HttpRequestFn = httpRequest) {
    this.http = http;
  }

  async render(url: string, timeoutMs: number, signal?: AbortSignal): Promise<RenderedPage> {
    let html: string;
    try {
      const body = await this.http<unknown>({
        method: "GET",
        url,
        headers: RENDERER_HTTP_HEADERS,
        timeoutMs,
        responseType: "text",
        // The extractor owns the retry-with-longer-timeout policy
        retry: { maxAttempts: 1 },
        signal,
      });
      html = typeof body === "string" ? body : "";
    } catch (err) {
      if (signal?.aborted) {
        throw new RenderError(url, "aborted", "stop requested", err);
      }
      if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
        throw new RenderError(url, "timeout", `no response within ${timeoutMs}ms`, err);
      }
      const detail = err instanceof HttpError ? `HTTP ${err.status}` : errorMessage(err);
      throw new RenderError(url, "transport", detail, err);
    }

    const text = htmlToText(html);
    if (text.length < MIN_RENDERED_TEXT_LENGTH) {
      throw new RenderError(url, "empty", `visible text shorter than ${MIN_RENDERED_TEXT_LENGTH} characters`);
    }

    return { url, html, text };
  }
}
