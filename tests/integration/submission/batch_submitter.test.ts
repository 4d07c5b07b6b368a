/**
 * Batch Submitter Test
 *
 * Real SQLite database (failed_batches) and a mock ingestion API.
 */

import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { createMockHttp, type MockHttp } from "../../helpers/mockHttp";
import { createRecordingLogger, makeJobRecord } from "../../helpers/fakes";
import { BatchSubmitter } from "@/submission";
import { IngestionApiClient } from "@/clients/ingestion";
import { listUnresolvedFailedBatches } from "@/db";
import type { IngestionRequestBody, JobRecord } from "@/types";

const BATCH_URL = "https://ingest.test/api/batch";

function records(count: number): JobRecord[] {
  return Array.from({ length: count }, (_, i) =>
    makeJobRecord({ sourceUrl: `https://boards.greenhouse.io/acme/jobs/${200 + i}` }),
  );
}

describe("BatchSubmitter", () => {
  let harness: TestDbHarness | null = null;
  let mock: MockHttp;
  let delays: number[];

  function submitter(batchSize: number): BatchSubmitter {
    const client = new IngestionApiClient(
      { baseUrl: "https://ingest.test/api", apiKey: "test-secret", source: "Job Board Crawler" },
      mock.request,
    );
    return new BatchSubmitter({
      client,
      batchSize,
      log: createRecordingLogger(),
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
  }

  function postedUrls(): string[][] {
    return mock
      .getRecordedRequests()
      .map((req) => (req.json as IngestionRequestBody).jobs.map((job) => job.sourceUrl));
  }

  beforeEach(() => {
    harness = createTestDbSync();
    mock = createMockHttp();
    delays = [];
  });

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should split accepted and rejected records as the API reports them", async () => {
    const batch = records(5);
    mock.on("POST", BATCH_URL, {
      created: 3,
      skipped: 0,
      rejected: [
        { url: batch[3].sourceUrl, reason: "duplicate" },
        { url: batch[4].sourceUrl, reason: "invalid" },
      ],
    });
    const sub = submitter(10);

    const outcome = await sub.deliver(batch);

    expect(outcome).toEqual({
      status: "delivered",
      attempts: 1,
      accepted: 3,
      rejected: [
        { url: batch[3].sourceUrl, reason: "duplicate" },
        { url: batch[4].sourceUrl, reason: "invalid" },
      ],
    });
    expect(sub.counters()).toMatchObject({ batchesSent: 1, recordsDelivered: 3, recordsRejected: 2 });
    expect(listUnresolvedFailedBatches()).toEqual([]);
  });

  it("should retry transport failures with backoff and then deliver", async () => {
    mock.onSequence("POST", BATCH_URL, [
      { status: 503, body: "unavailable" },
      { networkError: "fetch failed" },
      { status: 200, body: { created: 2, skipped: 0, rejected: [] } },
    ]);
    const sub = submitter(10);

    const outcome = await sub.deliver(records(2));

    expect(outcome).toMatchObject({ status: "delivered", attempts: 3, accepted: 2 });
    expect(delays).toHaveLength(2);
    expect(mock.getRecordedRequests()).toHaveLength(3);
  });

  it("should record a batch that exhausts its attempts", async () => {
    mock.onResponse("POST", BATCH_URL, { status: 503, body: "down" });
    const sub = submitter(10);
    const batch = records(2);

    const outcome = await sub.deliver(batch);

    const error = `Batch delivery failed after 3 attempt(s): HTTP 503 Mock Response - ${BATCH_URL} - down`;
    expect(outcome).toMatchObject({ status: "failed", attempts: 3, error });
    const [stored] = listUnresolvedFailedBatches();
    expect(stored).toMatchObject({
      sourceUrls: batch.map((r) => r.sourceUrl),
      error,
      attempts: 3,
    });
    expect(sub.counters()).toMatchObject({ batchesFailed: 1, recordsFailed: 2, recordsDelivered: 0 });
  });

  it("should treat a malformed response as a transport failure", async () => {
    mock.on("POST", BATCH_URL, "OK");
    const sub = submitter(10);

    const outcome = await sub.deliver(records(1));

    expect(outcome.status).toBe("failed");
    expect(mock.getRecordedRequests()).toHaveLength(3);
  });

  it("should not retry a refused batch", async () => {
    mock.onResponse("POST", BATCH_URL, { status: 400, body: { error: "jobs required" } });
    const sub = submitter(10);
    const batch = records(2);

    const outcome = await sub.deliver(batch);

    expect(outcome).toEqual({
      status: "refused",
      attempts: 1,
      httpStatus: 400,
      rejected: batch.map((r) => ({ url: r.sourceUrl, reason: "HTTP 400" })),
    });
    expect(sub.counters().recordsRejected).toBe(2);
    expect(listUnresolvedFailedBatches()).toEqual([]);
  });

  it("should deliver full batches on enqueue and the rest on flush", async () => {
    mock.onCustom("POST", BATCH_URL, async (req) => ({
      status: 200,
      body: { created: (req.json as IngestionRequestBody).jobs.length, skipped: 0, rejected: [] },
    }));
    const sub = submitter(2);
    const batch = records(3);

    for (const record of batch) {
      await sub.enqueue(record);
    }
    expect(postedUrls()).toEqual([[batch[0].sourceUrl, batch[1].sourceUrl]]);
    expect(sub.pendingCount()).toBe(1);

    await sub.flush();

    expect(postedUrls()).toEqual([[batch[0].sourceUrl, batch[1].sourceUrl], [batch[2].sourceUrl]]);
    expect(sub.pendingCount()).toBe(0);
    expect(sub.counters()).toEqual({
      batchesSent: 2,
      recordsForwarded: 3,
      recordsDelivered: 3,
      recordsRejected: 0,
      recordsFailed: 0,
      batchesFailed: 0,
    });
  });

  it("should reject an invalid batch size", () => {
    expect(() => submitter(0)).toThrow("Invalid submit batch size: 0");
  });
});
