/**
 * Merge engine
 *
 * Executes merge decisions against the record store. Each candidate's
 * find-then-write runs in one store transaction, so two candidates for the
 * same URL are applied one after the other.
 */

import type { JobRecord, Logger, MergeDecision, MergeResult } from "@/types";
import type { RecordStore } from "@/interfaces";
import { StoreConstraintViolation } from "@/store";
import * as logger from "@/logger";
import { decideMerge } from "./mergeDecision";

export class MergeEngine {
  private readonly store: RecordStore;
  private readonly log: Logger;

  constructor(store: RecordStore, log: Logger = logger) {
    this.store = store;
    this.log = log;
  }

  /**
   * Decide and apply exactly one of insert / update / skip
   *
   * An insert that hits the store's uniqueness constraint is logged and
   * decided again against the record that won, through the update path.
   *
   * @throws Store errors other than StoreConstraintViolation
   */
  process(candidate: JobRecord): MergeResult {
    return this.store.transaction(() => {
      const decision = decideMerge(candidate, this.store.findByUrl(candidate.sourceUrl));
      if (decision.kind !== "insert") {
        return this.apply(decision, candidate, false);
      }

      try {
        this.store.insert(decision.record);
        return this.apply(decision, candidate, false);
      } catch (err) {
        if (!(err instanceof StoreConstraintViolation)) {
          throw err;
        }
        this.log.error("Uniqueness constraint hit on insert, re-routing to update", {
          sourceUrl: candidate.sourceUrl,
          error: err.message,
        });
        const existing = this.store.findByUrl(candidate.sourceUrl);
        if (!existing) {
          throw err;
        }
        return this.apply(decideMerge(candidate, existing), candidate, true);
      }
    });
  }

  /**
   * Persist an update (inserts are already written) and build the result
   */
  private apply(decision: MergeDecision, candidate: JobRecord, constraintViolation: boolean): MergeResult {
    switch (decision.kind) {
      case "insert":
        return {
          decision: "insert",
          sourceUrl: candidate.sourceUrl,
          forward: decision.record,
          constraintViolation,
        };
      case "update":
        this.store.update(decision.record);
        return {
          decision: "update",
          sourceUrl: candidate.sourceUrl,
          forward: decision.record,
          constraintViolation,
        };
      case "skip":
        return {
          decision: "skip",
          sourceUrl: candidate.sourceUrl,
          forward: null,
          constraintViolation,
          reason: decision.reason,
        };
    }
  }
}
