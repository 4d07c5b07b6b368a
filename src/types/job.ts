/**
 * Job record type definitions
 *
 * A job record is one posting, identified solely by its normalized source URL.
 */

import type { Platform } from "./platforms";

/**
 * Content fields of a job posting (everything except identity and metadata)
 */
export type JobContent = {
  title: string;
  company: string;
  aboutCompany: string;
  location: string;
  alternateLocations: string[];
  /** Canonical value after normalization ("Full time") or empty when unknown */
  employmentType: string;
  /** Role description and responsibilities merged */
  aboutJob: string;
  qualifications: string;
  benefits: string;
  salary: string;
  workEnvironment: string;
};

/**
 * Job record as held by the record store
 *
 * Completeness is not part of the record; it is recomputed from the
 * current field values whenever it is needed (see isJobComplete).
 */
export type JobRecord = JobContent & {
  /** Normalized URL (tracking parameters stripped), unique across the store */
  sourceUrl: string;
  /** Key of the employer whose board listed this posting */
  employerKey: string;
  /** UTC ISO 8601 timestamp of the extraction that produced the content */
  scrapedAt: string;
  sourceEmploymentPlatform: Platform;
};

/**
 * Required fields counted when comparing the completeness of two records
 */
export type RequiredJobField = "title" | "location" | "employmentType" | "aboutJob";
