/**
 * Work environment classification
 */

import type { WorkEnvironment } from "@/constants";
import { WORK_ENVIRONMENT_PATTERNS } from "@/constants";

export function classifyWorkEnvironment(text: string): WorkEnvironment | null {
  for (const { value, patterns } of WORK_ENVIRONMENT_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(text))) {
      return value;
    }
  }
  return null;
}

/**
 * Canonical work environment
 *
 * A stated value is classified on its own (kept as written when it does
 * not classify); an absent one is inferred from `context`.
 */
export function normalizeWorkEnvironment(stated: string, context: string): string {
  if (stated) {
    return classifyWorkEnvironment(stated) ?? stated;
  }
  return classifyWorkEnvironment(context) ?? "";
}
