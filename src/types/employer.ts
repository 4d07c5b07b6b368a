/**
 * Employer type definitions
 */

import type { Platform } from "./platforms";

/**
 * One employer job board to crawl, as configured in the employers file
 */
export type Employer = {
  /** Stable identifier used by run progress and job records */
  key: string;
  /** Display name, also the default company name of extracted jobs */
  name: string;
  /** Listing page(s) enumerating the employer's postings */
  listingUrls: string[];
  /** Platform override; detected from the first listing URL when absent */
  platform?: Platform;
};

/**
 * Per-employer summary of stored records, computed at decision time
 */
export type EmployerCrawlState = {
  totalJobs: number;
  completeJobs: number;
  incompleteJobs: number;
};
