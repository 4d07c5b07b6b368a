/**
 * Failed Batch Redelivery Test
 */

import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { createMockHttp, type MockHttp } from "../../helpers/mockHttp";
import { createRecordingLogger, makeJobRecord } from "../../helpers/fakes";
import { redeliverFailedBatches } from "@/submission";
import { IngestionApiClient } from "@/clients/ingestion";
import { SqliteRecordStore } from "@/store";
import { listUnresolvedFailedBatches, recordFailedBatch } from "@/db";
import type { IngestionRequestBody } from "@/types";

const BATCH_URL = "https://ingest.test/api/batch";
const URL_A = "https://boards.greenhouse.io/acme/jobs/100";
const URL_B = "https://boards.greenhouse.io/acme/jobs/101";
const URL_GONE = "https://boards.greenhouse.io/acme/jobs/999";

describe("redeliverFailedBatches", () => {
  let harness: TestDbHarness | null = null;
  let mock: MockHttp;
  let client: IngestionApiClient;
  let store: SqliteRecordStore;

  beforeEach(() => {
    harness = createTestDbSync();
    mock = createMockHttp();
    client = new IngestionApiClient(
      { baseUrl: "https://ingest.test/api", apiKey: "test-secret", source: "Job Board Crawler" },
      mock.request,
    );
    store = new SqliteRecordStore();
    store.insert(makeJobRecord({ sourceUrl: URL_A }));
    store.insert(makeJobRecord({ sourceUrl: URL_B }));
  });

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should resend stored records in their latest form and resolve the batch", async () => {
    recordFailedBatch({ runId: null, sourceUrls: [URL_A, URL_B, URL_GONE], error: "HTTP 503", attempts: 3 });
    store.update(makeJobRecord({ sourceUrl: URL_B, salary: "$150,000" }));
    mock.on("POST", BATCH_URL, { created: 2, skipped: 0, rejected: [] });

    const result = await redeliverFailedBatches(client, store, createRecordingLogger());

    expect(result).toEqual({ batches: 1, resolved: 1, stillFailing: 0, missingRecords: 1 });
    const [request] = mock.getRecordedRequests();
    const body = request.json as IngestionRequestBody;
    expect(body.jobs.map((j) => [j.sourceUrl, j.salaryRange])).toEqual([
      [URL_A, ""],
      [URL_B, "$150,000"],
    ]);
    expect(listUnresolvedFailedBatches()).toEqual([]);
  });

  it("should keep a batch open when delivery fails again", async () => {
    const id = recordFailedBatch({ runId: null, sourceUrls: [URL_A], error: "HTTP 503", attempts: 3 });
    mock.onResponse("POST", BATCH_URL, { networkError: "fetch failed" });

    const result = await redeliverFailedBatches(client, store, createRecordingLogger());

    expect(result).toEqual({ batches: 1, resolved: 0, stillFailing: 1, missingRecords: 0 });
    expect(listUnresolvedFailedBatches()).toMatchObject([{ id, error: "fetch failed", attempts: 4 }]);
  });

  it("should close a batch the API refuses or whose records are gone", async () => {
    recordFailedBatch({ runId: null, sourceUrls: [URL_A], error: "HTTP 503", attempts: 3 });
    recordFailedBatch({ runId: null, sourceUrls: [URL_GONE], error: "HTTP 503", attempts: 3 });
    mock.onResponse("POST", BATCH_URL, { status: 422, body: { error: "invalid" } });

    const result = await redeliverFailedBatches(client, store, createRecordingLogger());

    expect(result).toEqual({ batches: 2, resolved: 2, stillFailing: 0, missingRecords: 1 });
    expect(mock.getRecordedRequests()).toHaveLength(1);
    expect(listUnresolvedFailedBatches()).toEqual([]);
  });

  it("should do nothing without failed batches", async () => {
    expect(await redeliverFailedBatches(client, store, createRecordingLogger())).toEqual({
      batches: 0,
      resolved: 0,
      stillFailing: 0,
      missingRecords: 0,
    });
    expect(mock.getRecordedRequests()).toEqual([]);
  });
});
