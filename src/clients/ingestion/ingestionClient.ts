/**
 * Ingestion API client
 *
 * Downstream job-ingestion HTTP API: batch and single-job submission plus
 * a health probe. Requests go through the shared HTTP client with a single
 * attempt; batch retries are owned by the BatchSubmitter.
 */

import type {
  HttpRequestFn,
  IngestionBatchResponse,
  IngestionRejectedJob,
  IngestionRequestBody,
  NormalizedJob,
} from "@/types";
import { httpRequest } from "@/clients/http";
import {
  INGESTION_API_KEY_HEADER,
  INGESTION_BATCH_PATH,
  INGESTION_HEALTH_PATH,
  INGESTION_HTTP_TIMEOUT_MS,
  INGESTION_WEBHOOK_PATH,
} from "@/constants";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

export type IngestionClientConfig = {
  baseUrl: string;
  apiKey: string;
  source: string;
};

/**
 * Response body that does not match the documented shape
 */
export class MalformedIngestionResponseError extends Error {
  constructor(url: string, detail: string) {
    super(`Malformed ingestion response from ${url}: ${detail}`);
    this.name = "MalformedIngestionResponseError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCount(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Validate a POST /batch (or /webhook) response body
 *
 * Missing `skipped` or `rejected` default to 0 / []; a missing or invalid
 * `created` makes the body malformed.
 */
export function parseIngestionResponse(body: unknown, url: string): IngestionBatchResponse {
  if (!isRecord(body)) {
    throw new MalformedIngestionResponseError(url, "body is not a JSON object");
  }

  const created = toCount(body.created);
  if (created === null) {
    throw new MalformedIngestionResponseError(url, "created must be a non-negative integer");
  }

  const skipped = body.skipped === undefined ? 0 : toCount(body.skipped);
  if (skipped === null) {
    throw new MalformedIngestionResponseError(url, "skipped must be a non-negative integer");
  }

  let rejected: IngestionRejectedJob[] = [];
  if (body.rejected !== undefined) {
    if (!Array.isArray(body.rejected)) {
      throw new MalformedIngestionResponseError(url, "rejected must be an array");
    }
    rejected = body.rejected.map((entry: unknown) => {
      if (!isRecord(entry) || typeof entry.url !== "string") {
        throw new MalformedIngestionResponseError(url, "rejected entries need a url");
      }
      return {
        url: entry.url,
        reason: typeof entry.reason === "string" ? entry.reason : "unspecified",
      };
    });
  }

  return { created, skipped, rejected };
}

export class IngestionApiClient {
  private readonly config: IngestionClientConfig;
  private readonly http: HttpRequestFn;

  constructor(config: IngestionClientConfig, http: HttpRequestFn = httpRequest) {
    this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, "") };
    this.http = http;
  }

  get source(): string {
    return this.config.source;
  }

  private headers(): Record<string, string> {
    return { [INGESTION_API_KEY_HEADER]: this.config.apiKey };
  }

  private async post(path: string, jobs: NormalizedJob[]): Promise<IngestionBatchResponse> {
    const url = `${this.config.baseUrl}${path}`;
    const body: IngestionRequestBody = { jobs, source: this.config.source };

    const response = await this.http<unknown>({
      method: "POST",
      url,
      headers: this.headers(),
      json: body,
      timeoutMs: INGESTION_HTTP_TIMEOUT_MS,
      retry: { maxAttempts: 1 },
    });

    return parseIngestionResponse(response, url);
  }

  /**
   * POST {base}/batch
   *
   * @throws {HttpError} On non-2xx
   * @throws {MalformedIngestionResponseError} On an unexpected body
   */
  submitBatch(jobs: NormalizedJob[]): Promise<IngestionBatchResponse> {
    return this.post(INGESTION_BATCH_PATH, jobs);
  }

  /**
   * POST {base}/webhook with a single job
   */
  submitOne(job: NormalizedJob): Promise<IngestionBatchResponse> {
    return this.post(INGESTION_WEBHOOK_PATH, [job]);
  }

  /**
   * GET {base}/health
   *
   * @returns true when the API answered 2xx
   */
  async health(): Promise<boolean> {
    try {
      await this.http<unknown>({
        method: "GET",
        url: `${this.config.baseUrl}${INGESTION_HEALTH_PATH}`,
        headers: this.headers(),
        timeoutMs: INGESTION_HTTP_TIMEOUT_MS,
        retry: { maxAttempts: 1 },
      });
      return true;
    } catch (err) {
      logger.warn("Ingestion API health check failed", { error: errorMessage(err) });
      return false;
    }
  }
}
