/**
 * ExtractionError: the AI extraction step produced no usable result
 */

export class ExtractionError extends Error {
  public readonly sourceUrl: string;

  constructor(sourceUrl: string, message: string, cause?: unknown) {
    super(`AI extraction failed for ${sourceUrl}: ${message}`, { cause });
    this.name = "ExtractionError";
    this.sourceUrl = sourceUrl;
  }
}
