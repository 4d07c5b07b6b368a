/**
 * Data quality audit
 *
 * Read-only report over the jobs table: completeness per employer and
 * which required field keeps records incomplete.
 */

import type { DataQualityReport, EmployerQualityRow, Logger } from "@/types";
import { listAllJobs, rowToJobRecord } from "@/db";
import { isJobComplete, missingRequiredFields } from "@/freshness";
import * as logger from "@/logger";

function emptyRow(employerKey: string): EmployerQualityRow {
  return {
    employerKey,
    total: 0,
    complete: 0,
    incomplete: 0,
    missingTitle: 0,
    missingLocation: 0,
    missingEmploymentType: 0,
    shortDescription: 0,
  };
}

export function auditDataQuality(log: Logger = logger): DataQualityReport {
  const rows = new Map<string, EmployerQualityRow>();

  for (const record of listAllJobs().map(rowToJobRecord)) {
    let row = rows.get(record.employerKey);
    if (!row) {
      row = emptyRow(record.employerKey);
      rows.set(record.employerKey, row);
    }

    row.total++;
    if (isJobComplete(record)) {
      row.complete++;
      continue;
    }
    row.incomplete++;
    for (const field of missingRequiredFields(record)) {
      switch (field) {
        case "title":
          row.missingTitle++;
          break;
        case "location":
          row.missingLocation++;
          break;
        case "employmentType":
          row.missingEmploymentType++;
          break;
        case "aboutJob":
          row.shortDescription++;
          break;
      }
    }
  }

  const employers = [...rows.values()].sort((a, b) => a.employerKey.localeCompare(b.employerKey));
  const report: DataQualityReport = {
    totalJobs: employers.reduce((sum, r) => sum + r.total, 0),
    completeJobs: employers.reduce((sum, r) => sum + r.complete, 0),
    incompleteJobs: employers.reduce((sum, r) => sum + r.incomplete, 0),
    employers,
  };

  log.info("Data quality audit", {
    totalJobs: report.totalJobs,
    completeJobs: report.completeJobs,
    incompleteJobs: report.incompleteJobs,
    employers: employers.length,
  });
  for (const row of employers) {
    if (row.incomplete > 0) {
      log.info("Employer with incomplete jobs", { ...row });
    }
  }

  return report;
}
