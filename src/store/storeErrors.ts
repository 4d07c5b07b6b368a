/**
 * Record store errors
 */

/**
 * Insert of a URL that is already stored
 */
export class StoreConstraintViolation extends Error {
  public readonly sourceUrl: string;

  constructor(sourceUrl: string, cause?: unknown) {
    super(`Record already stored for URL ${sourceUrl}`, { cause });
    this.name = "StoreConstraintViolation";
    this.sourceUrl = sourceUrl;
  }
}

/**
 * Update of a URL that is not stored
 */
export class RecordNotFoundError extends Error {
  public readonly sourceUrl: string;

  constructor(sourceUrl: string) {
    super(`No stored record for URL ${sourceUrl}`);
    this.name = "RecordNotFoundError";
    this.sourceUrl = sourceUrl;
  }
}
