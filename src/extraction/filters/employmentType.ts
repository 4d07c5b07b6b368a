/**
 * Employment type filter
 *
 * Full-time postings pass with the canonical type; explicitly
 * non-full-time postings and hourly-only pay are rejected. A posting that
 * states no type passes with an empty type.
 */

import type { FilterResult } from "@/types";
import {
  CANONICAL_EMPLOYMENT_TYPE,
  FULL_TIME_PATTERNS,
  NON_FULL_TIME_PATTERNS,
} from "@/constants";
import { isHourlyOnlySalary } from "../normalizers/salary";

export type EmploymentTypeCheck =
  | { ok: true; employmentType: string }
  | Extract<FilterResult, { ok: false }>;

export function checkEmploymentType(employmentType: string, salary: string): EmploymentTypeCheck {
  const stated = employmentType.trim();

  if (stated) {
    const fullTime = FULL_TIME_PATTERNS.some((p) => p.test(stated));
    if (!fullTime && NON_FULL_TIME_PATTERNS.some((p) => p.test(stated))) {
      return { ok: false, reason: "non_full_time", detail: stated };
    }
  }

  if (isHourlyOnlySalary(salary)) {
    return { ok: false, reason: "hourly_only_salary", detail: salary.trim() };
  }

  return { ok: true, employmentType: stated ? CANONICAL_EMPLOYMENT_TYPE : "" };
}
