/**
 * Purge of stored jobs that no longer pass the ingestion filters
 *
 * Re-applies the geography and employment-type filters to every stored
 * record. Dry run unless `dryRun: false` is passed explicitly; this is the
 * only path that deletes job rows.
 */

import type { Logger, PurgeCandidate, PurgeResult } from "@/types";
import { deleteJobsByUrls, listAllJobs, rowToJobRecord } from "@/db";
import { checkEmploymentType, checkGeography } from "@/extraction";
import * as logger from "@/logger";

export function purgeNonConformingJobs(
  options: { dryRun?: boolean } = {},
  log: Logger = logger,
): PurgeResult {
  const dryRun = options.dryRun ?? true;
  const records = listAllJobs().map(rowToJobRecord);
  const candidates: PurgeCandidate[] = [];

  for (const record of records) {
    const geography = checkGeography(record.location, record.alternateLocations);
    if (!geography.ok) {
      candidates.push({
        sourceUrl: record.sourceUrl,
        employerKey: record.employerKey,
        reason: `${geography.reason}: ${geography.detail}`,
      });
      continue;
    }
    const employment = checkEmploymentType(record.employmentType, record.salary);
    if (!employment.ok) {
      candidates.push({
        sourceUrl: record.sourceUrl,
        employerKey: record.employerKey,
        reason: `${employment.reason}: ${employment.detail}`,
      });
    }
  }

  for (const candidate of candidates) {
    log.info(dryRun ? "Would purge job" : "Purging job", { ...candidate });
  }

  const deleted = dryRun || candidates.length === 0
    ? 0
    : deleteJobsByUrls(candidates.map((c) => c.sourceUrl));

  log.info("Purge finished", { dryRun, examined: records.length, candidates: candidates.length, deleted });
  return { dryRun, examined: records.length, candidates, deleted };
}
