/**
 * Renderer interface: external collaborator that turns a URL into page content
 */

import type { RenderedPage } from "@/types";

export interface Renderer {
  /**
   * Render a page
   *
   * @param url - Page to render
   * @param timeoutMs - Upper bound for the whole render
   * @param signal - Run-wide stop signal
   * @throws {RenderError} On timeout, transport failure or empty content
   */
  render(url: string, timeoutMs: number, signal?: AbortSignal): Promise<RenderedPage>;
}
