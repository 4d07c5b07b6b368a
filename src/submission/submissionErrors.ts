/**
 * Delivery failed at the transport level after every attempt
 */
export class SubmissionTransportError extends Error {
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Batch delivery failed after ${attempts} attempt(s): ${detail}`, { cause });
    this.name = "SubmissionTransportError";
    this.attempts = attempts;
  }
}
