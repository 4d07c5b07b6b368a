/**
 * Downstream submission type definitions
 */

/**
 * Job as sent to the ingestion API (downstream field names)
 */
export type NormalizedJob = {
  title: string;
  company: string;
  aboutCompany: string;
  location: string;
  alternateLocations: string;
  employmentType: string;
  aboutJob: string;
  qualifications: string;
  benefits: string;
  salaryRange: string;
  workEnvironment: string;
  source: string;
  sourceUrl: string;
  sourceEmploymentPlatform: string;
  postedDate: string;
};

/**
 * Request body of POST /batch and POST /webhook
 */
export type IngestionRequestBody = {
  jobs: NormalizedJob[];
  source: string;
};

export type IngestionRejectedJob = {
  url: string;
  reason: string;
};

/**
 * Response body of POST /batch and POST /webhook
 */
export type IngestionBatchResponse = {
  created: number;
  skipped: number;
  rejected: IngestionRejectedJob[];
};

/**
 * Outcome of delivering one batch
 *
 * - delivered: downstream answered; accepted/rejected split as reported
 * - refused: non-retryable 4xx; every record of the batch counted rejected
 * - failed: transport failure after all attempts; batch recorded for redelivery
 */
export type BatchDeliveryOutcome =
  | {
      status: "delivered";
      attempts: number;
      accepted: number;
      rejected: IngestionRejectedJob[];
    }
  | {
      status: "refused";
      attempts: number;
      httpStatus: number;
      rejected: IngestionRejectedJob[];
    }
  | {
      status: "failed";
      attempts: number;
      sourceUrls: string[];
      error: string;
      failedBatchId: number | null;
    };

/**
 * Running totals kept by the batch submitter
 */
export type SubmissionCounters = {
  batchesSent: number;
  recordsForwarded: number;
  recordsDelivered: number;
  recordsRejected: number;
  recordsFailed: number;
  batchesFailed: number;
};

/**
 * Result of a redelivery pass over stored failed batches
 */
export type RedeliveryResult = {
  batches: number;
  resolved: number;
  stillFailing: number;
  /** URLs of failed batches no longer present in the store */
  missingRecords: number;
};
