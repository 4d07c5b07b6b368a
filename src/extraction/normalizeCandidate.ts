/**
 * Candidate normalization
 *
 * Turns an extracted field map into a JobRecord: text cleanup, salary and
 * work-environment standardization, then the geography and employment
 * type filters.
 */

import type {
  Employer,
  ExtractedFields,
  JobRecord,
  Platform,
  ValidationRejection,
} from "@/types";
import { cleanText, stripDecorativeSymbols } from "@/utils";
import { standardizeSalary } from "./normalizers/salary";
import { normalizeWorkEnvironment } from "./normalizers/workEnvironment";
import { checkGeography } from "./filters/geography";
import { checkEmploymentType } from "./filters/employmentType";

export type CandidateContext = {
  sourceUrl: string;
  employer: Pick<Employer, "key" | "name">;
  platform: Platform;
  scrapedAt: string;
};

export type CandidateResult =
  | { kind: "accepted"; record: JobRecord }
  | { kind: "rejected"; rejection: ValidationRejection }
  | { kind: "missing_title" };

function field(value: string | null | undefined): string {
  return value ? cleanText(stripDecorativeSymbols(value)) : "";
}

function locations(values: string[] | null | undefined, primary: string): string[] {
  const seen = new Set<string>([primary.toLowerCase()]);
  const result: string[] = [];
  for (const value of values ?? []) {
    const cleaned = field(value);
    const key = cleaned.toLowerCase();
    if (cleaned && !seen.has(key)) {
      seen.add(key);
      result.push(cleaned);
    }
  }
  return result;
}

export function normalizeCandidate(fields: ExtractedFields, ctx: CandidateContext): CandidateResult {
  const title = field(fields.title);
  if (!title) {
    return { kind: "missing_title" };
  }

  const location = field(fields.location);
  const alternateLocations = locations(fields.alternateLocations, location);
  const aboutJob = field(fields.aboutJob);
  const salary = standardizeSalary(field(fields.salary));

  const geography = checkGeography(location, alternateLocations);
  if (!geography.ok) {
    return {
      kind: "rejected",
      rejection: { sourceUrl: ctx.sourceUrl, reason: geography.reason, detail: geography.detail },
    };
  }

  const employment = checkEmploymentType(field(fields.employmentType), field(fields.salary));
  if (!employment.ok) {
    return {
      kind: "rejected",
      rejection: { sourceUrl: ctx.sourceUrl, reason: employment.reason, detail: employment.detail },
    };
  }

  return {
    kind: "accepted",
    record: {
      sourceUrl: ctx.sourceUrl,
      employerKey: ctx.employer.key,
      title,
      company: field(fields.company) || ctx.employer.name,
      aboutCompany: field(fields.aboutCompany),
      location,
      alternateLocations,
      employmentType: employment.employmentType,
      aboutJob,
      qualifications: field(fields.qualifications),
      benefits: field(fields.benefits),
      salary,
      workEnvironment: normalizeWorkEnvironment(
        field(fields.workEnvironment),
        [location, title, aboutJob].join("\n"),
      ),
      scrapedAt: ctx.scrapedAt,
      sourceEmploymentPlatform: ctx.platform,
    },
  };
}
