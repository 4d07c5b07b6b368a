/**
 * RenderError: a page could not be rendered
 */

export type RenderFailureKind = "timeout" | "transport" | "empty" | "aborted";

export class RenderError extends Error {
  public readonly url: string;
  public readonly kind: RenderFailureKind;

  constructor(url: string, kind: RenderFailureKind, message: string, cause?: unknown) {
    super(`Render failed (${kind}) for ${url}: ${message}`, { cause });
    this.name = "RenderError";
    this.url = url;
    this.kind = kind;
  }
}
