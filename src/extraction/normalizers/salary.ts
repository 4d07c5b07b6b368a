/**
 * Salary standardization
 *
 * Amounts are rendered as "$180,000 - $231,000" (or "$180,000"), with
 * " per hour" / " per month" appended for non-yearly pay.
 */

import type { SalaryPeriod } from "@/constants";
import { EMPTY_SALARY_VALUES, SALARY_PATTERNS, SALARY_PERIOD_INDICATORS } from "@/constants";
import { cleanText } from "@/utils";

export type ParsedSalary = {
  min: number;
  max: number | null;
  period: SalaryPeriod;
};

function toAmount(raw: string, thousands: boolean): number {
  const value = parseInt(raw.replace(/,/g, ""), 10);
  return thousands ? value * 1000 : value;
}

/**
 * Pay periods mentioned anywhere in the text
 */
export function detectSalaryPeriods(text: string): Set<SalaryPeriod> {
  const periods = new Set<SalaryPeriod>();
  for (const indicator of SALARY_PERIOD_INDICATORS) {
    if (indicator.pattern.test(text)) {
      periods.add(indicator.period);
    }
  }
  return periods;
}

function primaryPeriod(periods: Set<SalaryPeriod>): SalaryPeriod {
  for (const indicator of SALARY_PERIOD_INDICATORS) {
    if (periods.has(indicator.period)) {
      return indicator.period;
    }
  }
  return "yearly";
}

export function isEmptySalary(text: string): boolean {
  return EMPTY_SALARY_VALUES.includes(text.trim().toLowerCase());
}

/**
 * First amount (or range) found in the text, patterns tried from most to
 * least specific
 */
export function parseSalary(text: string): ParsedSalary | null {
  if (isEmptySalary(text)) {
    return null;
  }

  const period = primaryPeriod(detectSalaryPeriods(text));

  for (const { pattern, range, thousands } of SALARY_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) {
      continue;
    }
    const min = toAmount(match[1], thousands);
    const max = range && match[2] !== undefined ? toAmount(match[2], thousands) : null;
    return { min, max, period };
  }

  return null;
}

const PERIOD_SUFFIX: Record<SalaryPeriod, string> = {
  yearly: "",
  hourly: " per hour",
  monthly: " per month",
};

function formatAmount(value: number): string {
  return `$${value.toLocaleString("en-US")}`;
}

export function formatSalary(salary: ParsedSalary): string {
  const amount =
    salary.max !== null && salary.max !== salary.min
      ? `${formatAmount(salary.min)} - ${formatAmount(salary.max)}`
      : formatAmount(salary.min);
  return amount + PERIOD_SUFFIX[salary.period];
}

/**
 * Standardized salary text
 *
 * Empty markers ("N/A", "null", ...) become ""; text without a
 * recognizable amount is kept as cleaned text.
 */
export function standardizeSalary(raw: string): string {
  const text = cleanText(raw);
  if (isEmptySalary(text)) {
    return "";
  }
  const parsed = parseSalary(text);
  return parsed ? formatSalary(parsed) : text;
}

/**
 * Salary quoted only per hour (no yearly figure anywhere)
 */
export function isHourlyOnlySalary(raw: string): boolean {
  if (isEmptySalary(raw)) {
    return false;
  }
  const periods = detectSalaryPeriods(raw);
  return periods.has("hourly") && !periods.has("yearly");
}
