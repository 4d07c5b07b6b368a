/**
 * Work environment classification constants
 */

export type WorkEnvironment = "Remote" | "Hybrid" | "On-site";

/**
 * Patterns per work environment, checked in order (hybrid first: hybrid
 * descriptions usually mention remote days too)
 */
export const WORK_ENVIRONMENT_PATTERNS: ReadonlyArray<{
  value: WorkEnvironment;
  patterns: readonly RegExp[];
}> = [
  {
    value: "Hybrid",
    patterns: [/\bhybrid\b/i, /\bmix of remote and office\b/i, /\bpartially remote\b/i],
  },
  {
    value: "Remote",
    patterns: [
      /\bfully remote\b/i,
      /\bremote[\s-]first\b/i,
      /\b100% remote\b/i,
      /\bwork from home\b/i,
      /\bremote\b/i,
    ],
  },
  {
    value: "On-site",
    patterns: [/\bon[\s-]?site\b/i, /\bin[\s-]office\b/i, /\bin[\s-]person\b/i],
  },
];
