/**
 * Record completeness
 *
 * Completeness is derived from the current field values every time it is
 * asked for; it is never stored.
 */

import type { JobContent, RequiredJobField } from "@/types";
import { MIN_ABOUT_JOB_LENGTH, REQUIRED_JOB_FIELDS } from "@/constants";

type CompletenessFields = Pick<JobContent, RequiredJobField>;

function isFilled(record: CompletenessFields, field: RequiredJobField): boolean {
  return record[field].trim().length > 0;
}

/**
 * A record is complete when title, location and employment type are
 * non-empty and the trimmed aboutJob is longer than MIN_ABOUT_JOB_LENGTH
 */
export function isJobComplete(record: CompletenessFields): boolean {
  return (
    isFilled(record, "title") &&
    isFilled(record, "location") &&
    isFilled(record, "employmentType") &&
    record.aboutJob.trim().length > MIN_ABOUT_JOB_LENGTH
  );
}

/**
 * Number of required fields that are non-empty (0..4)
 */
export function countFilledRequiredFields(record: CompletenessFields): number {
  return REQUIRED_JOB_FIELDS.filter((field) => isFilled(record, field)).length;
}

/**
 * Required fields that keep the record incomplete
 */
export function missingRequiredFields(record: CompletenessFields): RequiredJobField[] {
  return REQUIRED_JOB_FIELDS.filter((field) =>
    field === "aboutJob"
      ? record.aboutJob.trim().length <= MIN_ABOUT_JOB_LENGTH
      : !isFilled(record, field),
  );
}
