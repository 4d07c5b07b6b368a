/**
 * CollectionError: an employer's posting URLs could not be enumerated
 */

export class CollectionError extends Error {
  public readonly employerKey: string;

  constructor(employerKey: string, message: string, cause?: unknown) {
    super(`URL collection failed for ${employerKey}: ${message}`, { cause });
    this.name = "CollectionError";
    this.employerKey = employerKey;
  }
}
