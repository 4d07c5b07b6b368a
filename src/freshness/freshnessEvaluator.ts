/**
 * Freshness evaluator
 *
 * Decides per employer whether a crawl can be skipped. The state is read
 * from the store at decision time; nothing about previous decisions is
 * remembered, and the age of records is never a trigger.
 */

import type { Employer, EmployerCrawlState, FreshnessDecision, Logger } from "@/types";
import type { RecordStore } from "@/interfaces";
import * as logger from "@/logger";

/**
 * Skip iff the employer has at least one stored record and none of its
 * records is incomplete
 */
export function evaluateFreshness(state: EmployerCrawlState): FreshnessDecision {
  if (state.totalJobs === 0) {
    return { decision: "full_crawl", reason: "no stored jobs", state };
  }
  if (state.incompleteJobs > 0) {
    return {
      decision: "full_crawl",
      reason: `${state.incompleteJobs} of ${state.totalJobs} stored jobs incomplete`,
      state,
    };
  }
  return {
    decision: "skip",
    reason: `all ${state.totalJobs} stored jobs complete`,
    state,
  };
}

/**
 * Read the employer's state from the store, then decide
 */
export function evaluateEmployerFreshness(
  employer: Pick<Employer, "key">,
  store: RecordStore,
  log: Logger = logger,
): FreshnessDecision {
  const decision = evaluateFreshness(store.countByEmployer(employer.key));

  log.debug("Freshness decision", {
    employerKey: employer.key,
    decision: decision.decision,
    reason: decision.reason,
    ...decision.state,
  });

  return decision;
}
