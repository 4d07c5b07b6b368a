/**
 * Completeness constants
 */

import type { RequiredJobField } from "@/types";

/**
 * aboutJob must be strictly longer than this (trimmed) for a record to be complete
 */
export const MIN_ABOUT_JOB_LENGTH = 200;

/**
 * Fields counted when comparing two records for completeness
 */
export const REQUIRED_JOB_FIELDS: readonly RequiredJobField[] = [
  "title",
  "location",
  "employmentType",
  "aboutJob",
];
