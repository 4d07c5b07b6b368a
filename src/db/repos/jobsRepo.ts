/**
 * Jobs repository
 *
 * Data access layer for the jobs table. source_url is UNIQUE; inserting a
 * stored URL surfaces SQLite's constraint error to the caller.
 */

import type { JobRecord, JobRow, Platform } from "@/types";
import { ALL_PLATFORMS } from "@/constants";
import { getDb } from "../connection";

function toPlatform(value: string): Platform {
  return ALL_PLATFORMS.find((p) => p === value) ?? "generic";
}

function parseAlternateLocations(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed)
      ? parsed.filter((v): v is string => typeof v === "string")
      : [];
  } catch {
    return [];
  }
}

/**
 * Map a jobs row to the domain record
 */
export function rowToJobRecord(row: JobRow): JobRecord {
  return {
    sourceUrl: row.source_url,
    employerKey: row.employer_key,
    title: row.title,
    company: row.company,
    aboutCompany: row.about_company,
    location: row.location,
    alternateLocations: parseAlternateLocations(row.alternate_locations_json),
    employmentType: row.employment_type,
    aboutJob: row.about_job,
    qualifications: row.qualifications,
    benefits: row.benefits,
    salary: row.salary,
    workEnvironment: row.work_environment,
    sourceEmploymentPlatform: toPlatform(row.source_platform),
    scrapedAt: row.scraped_at,
  };
}

function toParams(record: JobRecord): Record<string, string> {
  return {
    source_url: record.sourceUrl,
    employer_key: record.employerKey,
    title: record.title,
    company: record.company,
    about_company: record.aboutCompany,
    location: record.location,
    alternate_locations_json: JSON.stringify(record.alternateLocations),
    employment_type: record.employmentType,
    about_job: record.aboutJob,
    qualifications: record.qualifications,
    benefits: record.benefits,
    salary: record.salary,
    work_environment: record.workEnvironment,
    source_platform: record.sourceEmploymentPlatform,
    scraped_at: record.scrapedAt,
  };
}

export function getJobByUrl(sourceUrl: string): JobRow | undefined {
  const db = getDb();
  return db.prepare("SELECT * FROM jobs WHERE source_url = ?").get(sourceUrl) as
    | JobRow
    | undefined;
}

/**
 * Insert a new job row
 *
 * @throws SQLite UNIQUE constraint error when source_url already exists
 * @returns Row id
 */
export function insertJob(record: JobRecord): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO jobs (
      source_url, employer_key, title, company, about_company, location,
      alternate_locations_json, employment_type, about_job, qualifications,
      benefits, salary, work_environment, source_platform, scraped_at
    ) VALUES (
      @source_url, @employer_key, @title, @company, @about_company, @location,
      @alternate_locations_json, @employment_type, @about_job, @qualifications,
      @benefits, @salary, @work_environment, @source_platform, @scraped_at
    )
  `,
    )
    .run(toParams(record));

  return Number(result.lastInsertRowid);
}

/**
 * Overwrite content fields of the row with the same source_url
 *
 * employer_key is kept from the first insert.
 *
 * @returns Number of rows changed (0 when the URL is unknown)
 */
export function updateJobByUrl(record: JobRecord): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    UPDATE jobs SET
      title = @title,
      company = @company,
      about_company = @about_company,
      location = @location,
      alternate_locations_json = @alternate_locations_json,
      employment_type = @employment_type,
      about_job = @about_job,
      qualifications = @qualifications,
      benefits = @benefits,
      salary = @salary,
      work_environment = @work_environment,
      source_platform = @source_platform,
      scraped_at = @scraped_at,
      updated_at = datetime('now')
    WHERE source_url = @source_url
  `,
    )
    .run(toParams(record));

  return result.changes;
}

export function listJobsByEmployer(employerKey: string): JobRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM jobs WHERE employer_key = ? ORDER BY id")
    .all(employerKey) as JobRow[];
}

export function listAllJobs(): JobRow[] {
  const db = getDb();
  return db.prepare("SELECT * FROM jobs ORDER BY employer_key, id").all() as JobRow[];
}

export function countJobs(): number {
  const db = getDb();
  const row = db.prepare("SELECT COUNT(*) AS n FROM jobs").get() as { n: number };
  return row.n;
}

/**
 * Delete jobs by source URL (single transaction)
 *
 * @returns Number of rows deleted
 */
export function deleteJobsByUrls(sourceUrls: string[]): number {
  if (sourceUrls.length === 0) {
    return 0;
  }

  const db = getDb();
  const stmt = db.prepare("DELETE FROM jobs WHERE source_url = ?");
  const deleteAll = db.transaction((urls: string[]) => {
    let deleted = 0;
    for (const url of urls) {
      deleted += stmt.run(url).changes;
    }
    return deleted;
  });

  return deleteAll(sourceUrls);
}
