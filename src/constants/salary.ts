/**
 * Salary parsing constants
 */

export type SalaryPeriod = "yearly" | "hourly" | "monthly";

/**
 * Salary patterns, ordered from most to least specific
 */
export const SALARY_PATTERNS: ReadonlyArray<{
  name: string;
  pattern: RegExp;
  range: boolean;
  thousands: boolean;
}> = [
  { name: "range_k", pattern: /\$(\d{1,3})K\s*[-–]\s*\$?(\d{1,3})K/i, range: true, thousands: true },
  { name: "single_k", pattern: /\$(\d{1,3})K(?!\s*[-–]\s*\$)/i, range: false, thousands: true },
  { name: "range_commas", pattern: /\$(\d{1,3}(?:,\d{3})+)\s*[-–]\s*\$?(\d{1,3}(?:,\d{3})+)/, range: true, thousands: false },
  { name: "range_plain", pattern: /\$(\d{2,7})(?:\.\d{2})?\s*[-–]\s*\$?(\d{2,7})(?:\.\d{2})?/, range: true, thousands: false },
  { name: "range_to", pattern: /\$(\d{1,3}(?:,\d{3})*)\s+to\s+\$(\d{1,3}(?:,\d{3})*)/i, range: true, thousands: false },
  { name: "single_commas", pattern: /\$(\d{1,3}(?:,\d{3})+)(?!K)/, range: false, thousands: false },
  { name: "single_plain", pattern: /\$(\d{2,7})(?![\dK])/, range: false, thousands: false },
];

/**
 * Indicators of the pay period, checked in order
 */
export const SALARY_PERIOD_INDICATORS: ReadonlyArray<{
  period: SalaryPeriod;
  pattern: RegExp;
}> = [
  { period: "hourly", pattern: /(per\s+hour|hourly|\/\s*h(ou)?r\b|\ban?\s+hour\b)/i },
  { period: "monthly", pattern: /(per\s+month|monthly|\/\s*mo(nth)?\b)/i },
  { period: "yearly", pattern: /(per\s+year|annual(ly)?|yearly|\/\s*y(ea)?r\b)/i },
];

/**
 * Values that mean "no salary information"
 */
export const EMPTY_SALARY_VALUES: readonly string[] = ["", "null", "none", "n/a", "not specified"];
