/**
 * Maintenance Operations Test
 *
 * Data quality audit and purge of non-conforming jobs over a seeded store.
 */

import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { createRecordingLogger, makeJobRecord } from "../../helpers/fakes";
import { auditDataQuality, purgeNonConformingJobs } from "@/maintenance";
import { countJobs, insertJob } from "@/db";

const URL_A = "https://boards.greenhouse.io/acme/jobs/1";
const URL_B = "https://boards.greenhouse.io/acme/jobs/2";
const URL_C = "https://globex.test/jobs/3";
const URL_D = "https://globex.test/jobs/4";
const URL_E = "https://boards.greenhouse.io/acme/jobs/5";

describe("Maintenance", () => {
  let harness: TestDbHarness | null = null;

  beforeEach(() => {
    harness = createTestDbSync();
    // Inserted in id order A..E
    insertJob(makeJobRecord({ sourceUrl: URL_A }));
    insertJob(makeJobRecord({ sourceUrl: URL_B, location: "", aboutJob: "Short." }));
    insertJob(makeJobRecord({ sourceUrl: URL_C, employerKey: "globex", employmentType: "" }));
    insertJob(makeJobRecord({ sourceUrl: URL_D, employerKey: "globex", location: "London, UK" }));
    insertJob(makeJobRecord({ sourceUrl: URL_E, salary: "$30/hr" }));
  });

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should report completeness per employer", () => {
    const report = auditDataQuality(createRecordingLogger());

    expect(report).toEqual({
      totalJobs: 5,
      completeJobs: 3,
      incompleteJobs: 2,
      employers: [
        {
          employerKey: "acme",
          total: 3,
          complete: 2,
          incomplete: 1,
          missingTitle: 0,
          missingLocation: 1,
          missingEmploymentType: 0,
          shortDescription: 1,
        },
        {
          employerKey: "globex",
          total: 2,
          complete: 1,
          incomplete: 1,
          missingTitle: 0,
          missingLocation: 0,
          missingEmploymentType: 1,
          shortDescription: 0,
        },
      ],
    });
  });

  it("should list purge candidates without deleting on a dry run", () => {
    const result = purgeNonConformingJobs({}, createRecordingLogger());

    expect(result).toEqual({
      dryRun: true,
      examined: 5,
      candidates: [
        { sourceUrl: URL_B, employerKey: "acme", reason: "unconfirmed_location: no location stated" },
        { sourceUrl: URL_E, employerKey: "acme", reason: "hourly_only_salary: $30/hr" },
        { sourceUrl: URL_D, employerKey: "globex", reason: "non_us_location: London, UK" },
      ],
      deleted: 0,
    });
    expect(countJobs()).toBe(5);
  });

  it("should delete candidates when applied", () => {
    const log = createRecordingLogger();

    const result = purgeNonConformingJobs({ dryRun: false }, log);

    expect(result.deleted).toBe(3);
    expect(countJobs()).toBe(2);
    expect(log.lines.filter((l) => l.message === "Purging job")).toHaveLength(3);
  });
});
