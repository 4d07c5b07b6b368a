/**
 * Employment type constants
 */

/**
 * The single value stored for accepted postings with a known type
 */
export const CANONICAL_EMPLOYMENT_TYPE = "Full time";

/**
 * Patterns identifying full-time postings
 */
export const FULL_TIME_PATTERNS: readonly RegExp[] = [
  /\bfull[\s-]?time\b/i,
  /\bpermanent\b/i,
  /\bregular\b/i,
];

/**
 * Patterns identifying explicitly non-full-time postings
 */
export const NON_FULL_TIME_PATTERNS: readonly RegExp[] = [
  /\bpart[\s-]?time\b/i,
  /\bcontract(or)?\b/i,
  /\bintern(ship)?\b/i,
  /\btemp(orary)?\b/i,
  /\bfreelance\b/i,
  /\bseasonal\b/i,
  /\bhourly\b/i,
  /\bper[\s-]diem\b/i,
];
