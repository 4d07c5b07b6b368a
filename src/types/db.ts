/**
 * Database type definitions
 *
 * Row shapes aligned with migrations/0001_init.sql.
 */

import type { RunStopReason } from "./runner";

/**
 * jobs table row
 */
export type JobRow = {
  id: number;
  source_url: string;
  employer_key: string;
  title: string;
  company: string;
  about_company: string;
  location: string;
  /** JSON array of strings */
  alternate_locations_json: string;
  employment_type: string;
  about_job: string;
  qualifications: string;
  benefits: string;
  salary: string;
  work_environment: string;
  source_platform: string;
  scraped_at: string;
  created_at: string;
  updated_at: string;
};

export type CrawlRunStatus = "running" | "success" | "failure";

/**
 * crawl_runs table row
 */
export type CrawlRunRow = {
  id: number;
  owner_id: string;
  started_at: string;
  finished_at: string | null;
  status: CrawlRunStatus;
  stop_reason: RunStopReason | null;
  start_index: number | null;
  next_index: number | null;
  /** JSON-serialized RunSummary counters */
  counters_json: string | null;
  error: string | null;
};

export type CrawlRunUpdate = {
  status: CrawlRunStatus;
  stopReason?: RunStopReason | null;
  startIndex?: number | null;
  nextIndex?: number | null;
  counters?: Record<string, number>;
  error?: string | null;
};

/**
 * failed_batches table row
 */
export type FailedBatchRow = {
  id: number;
  run_id: number | null;
  /** JSON array of normalized source URLs */
  source_urls_json: string;
  error: string;
  attempts: number;
  created_at: string;
  resolved_at: string | null;
};

export type FailedBatch = {
  id: number;
  runId: number | null;
  sourceUrls: string[];
  error: string;
  attempts: number;
  createdAt: string;
  resolvedAt: string | null;
};
