/**
 * Merge decision (pure)
 *
 * Given a candidate and the stored record with the same normalized URL
 * (if any), decide insert / update / skip. Updates merge field-wise so
 * that a stored record never loses a filled required field and never
 * gets a shorter description.
 */

import type { JobContent, JobRecord, MergeDecision } from "@/types";
import { countFilledRequiredFields, isJobComplete } from "@/freshness/completeness";

const TEXT_FIELDS = [
  "title",
  "company",
  "aboutCompany",
  "location",
  "employmentType",
  "qualifications",
  "benefits",
  "salary",
  "workEnvironment",
] as const satisfies ReadonlyArray<keyof JobContent>;

/**
 * More filled required fields, or a longer aboutJob
 *
 * Either one is enough: the update merges field-wise, so a candidate that
 * only brings the description never empties a stored field.
 */
export function isMoreComplete(candidate: JobRecord, existing: JobRecord): boolean {
  return (
    countFilledRequiredFields(candidate) > countFilledRequiredFields(existing) ||
    candidate.aboutJob.trim().length > existing.aboutJob.trim().length
  );
}

function unionLocations(existing: readonly string[], candidate: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const location of [...existing, ...candidate]) {
    const key = location.trim().toLowerCase();
    if (key && !seen.has(key)) {
      seen.add(key);
      result.push(location);
    }
  }
  return result;
}

/**
 * Field-wise merge: candidate's non-empty values win, aboutJob keeps the
 * longer text, alternate locations are united
 *
 * Identity (sourceUrl, employerKey) stays with the stored record.
 */
export function mergeRecords(existing: JobRecord, candidate: JobRecord): JobRecord {
  const merged: JobRecord = {
    ...existing,
    scrapedAt: candidate.scrapedAt,
    sourceEmploymentPlatform: candidate.sourceEmploymentPlatform,
    aboutJob:
      candidate.aboutJob.trim().length > existing.aboutJob.trim().length
        ? candidate.aboutJob
        : existing.aboutJob,
    alternateLocations: unionLocations(existing.alternateLocations, candidate.alternateLocations),
  };

  for (const field of TEXT_FIELDS) {
    if (candidate[field].trim()) {
      merged[field] = candidate[field];
    }
  }

  return merged;
}

export function decideMerge(candidate: JobRecord, existing: JobRecord | null): MergeDecision {
  if (!existing) {
    return { kind: "insert", record: candidate };
  }
  if (isJobComplete(existing)) {
    return { kind: "skip", reason: "already_complete", existing };
  }
  if (isMoreComplete(candidate, existing)) {
    return { kind: "update", record: mergeRecords(existing, candidate), previous: existing };
  }
  return { kind: "skip", reason: "not_more_complete", existing };
}
