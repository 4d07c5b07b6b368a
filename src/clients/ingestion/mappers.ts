/**
 * Record → downstream job mapping
 */

import type { JobRecord, NormalizedJob } from "@/types";
import { ALTERNATE_LOCATIONS_SEPARATOR } from "@/constants";

/**
 * Map a stored record to the ingestion API's field names
 *
 * `source` is the configured source label; postedDate carries the
 * extraction timestamp.
 */
export function toNormalizedJob(record: JobRecord, source: string): NormalizedJob {
  return {
    title: record.title,
    company: record.company,
    aboutCompany: record.aboutCompany,
    location: record.location,
    alternateLocations: record.alternateLocations.join(ALTERNATE_LOCATIONS_SEPARATOR),
    employmentType: record.employmentType,
    aboutJob: record.aboutJob,
    qualifications: record.qualifications,
    benefits: record.benefits,
    salaryRange: record.salary,
    workEnvironment: record.workEnvironment,
    source,
    sourceUrl: record.sourceUrl,
    sourceEmploymentPlatform: record.sourceEmploymentPlatform,
    postedDate: record.scrapedAt,
  };
}
