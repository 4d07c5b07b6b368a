/**
 * Runtime configuration type definitions
 */

/**
 * Crawl configuration resolved from the environment
 */
export type CrawlConfig = {
  dbPath: string;
  progressFilePath: string;
  employersFilePath: string;
  /** Maximum employers processed per invocation */
  crawlBatchSize: number;
  /** Continue from the stored progress instead of index 0 */
  resume: boolean;
  /** Records per downstream batch call */
  submitBatchSize: number;
  ingestion: {
    baseUrl: string;
    apiKey: string;
    source: string;
  };
  renderTimeoutMs: number;
  renderRetryTimeoutMs: number;
  extractionConcurrency: number;
  /** Undefined when no API key is configured (AI step disabled) */
  openai?: {
    apiKey: string;
    model: string;
  };
  redeliverFailedBatches: boolean;
};

export type EnvLike = Record<string, string | undefined>;
