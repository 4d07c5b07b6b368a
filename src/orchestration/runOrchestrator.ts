/**
 * Run orchestrator: drives one crawl invocation over the employer list
 *
 * State machine:
 *   idle → selecting_employer → crawling_employer → submitting
 *     → checkpointing → (selecting_employer | done)
 * with `interrupted` reachable whenever the stop signal fires.
 *
 * The resume pointer is a RunProgress value threaded through the loop and
 * persisted at every checkpoint. URL- and employer-level failures are
 * recorded in the employer's report; store and checkpoint failures end
 * the run with stopReason "fatal".
 */

import type {
  Employer,
  EmployerCounters,
  EmployerReport,
  ExtractionMetrics,
  ExtractionOutcome,
  Logger,
  OrchestratorState,
  RunProgress,
  RunStopReason,
  RunSummary,
} from "@/types";
import type { Extractor, RecordStore, Renderer } from "@/interfaces";
import { evaluateEmployerFreshness } from "@/freshness";
import { CollectionError, collectJobUrls } from "@/collection";
import { extractJob } from "@/extraction";
import { MergeEngine } from "@/dedup";
import { BatchSubmitter } from "@/submission";
import { MAX_ERROR_MESSAGE_LENGTH } from "@/constants";
import { errorMessage, mapWithConcurrency, truncate } from "@/utils";
import * as logger from "@/logger";
import {
  advanceRunProgress,
  loadRunProgress,
  resolveRunStart,
  saveRunProgress,
} from "./runProgress";

export type RunOrchestratorDeps = {
  store: RecordStore;
  renderer: Renderer;
  /** null disables the AI step */
  extractor: Extractor | null;
  submitter: BatchSubmitter;
  progressFilePath: string;
  /** Employers processed per invocation */
  crawlBatchSize: number;
  resume: boolean;
  renderTimeoutMs: number;
  renderRetryTimeoutMs: number;
  extractionConcurrency: number;
  runId?: number | null;
  signal?: AbortSignal;
  now?: () => Date;
  log?: Logger;
};

export function emptyEmployerCounters(): EmployerCounters {
  return {
    collected: 0,
    inserted: 0,
    updated: 0,
    skipped: 0,
    rejected: 0,
    failed: 0,
    constraintViolations: 0,
    aiCalls: 0,
    aiSucceeded: 0,
    fallbacks: 0,
    extractionMs: 0,
  };
}

function addCounters(into: EmployerCounters, from: EmployerCounters): void {
  into.collected += from.collected;
  into.inserted += from.inserted;
  into.updated += from.updated;
  into.skipped += from.skipped;
  into.rejected += from.rejected;
  into.failed += from.failed;
  into.constraintViolations += from.constraintViolations;
  into.aiCalls += from.aiCalls;
  into.aiSucceeded += from.aiSucceeded;
  into.fallbacks += from.fallbacks;
  into.extractionMs += from.extractionMs;
}

function addMetrics(counters: EmployerCounters, metrics: ExtractionMetrics): void {
  if (metrics.aiAttempted) counters.aiCalls++;
  if (metrics.aiSucceeded) counters.aiSucceeded++;
  if (metrics.fallbackUsed) counters.fallbacks++;
  counters.extractionMs += metrics.durationMs;
}

export class RunOrchestrator {
  private readonly deps: RunOrchestratorDeps;
  private readonly log: Logger;
  private readonly merge: MergeEngine;
  private state: OrchestratorState = "idle";

  constructor(deps: RunOrchestratorDeps) {
    this.deps = deps;
    this.log = deps.log ?? logger;
    this.merge = new MergeEngine(deps.store, this.log);
  }

  getState(): OrchestratorState {
    return this.state;
  }

  private transition(next: OrchestratorState): void {
    this.log.debug("Orchestrator state", { from: this.state, to: next });
    this.state = next;
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  private aborted(): boolean {
    return this.deps.signal?.aborted ?? false;
  }

  /**
   * Process employers from the resume pointer until the list or the batch
   * limit is exhausted, or the stop signal fires
   *
   * Never throws for run-level failures: the summary carries
   * stopReason "fatal" and the error.
   */
  async run(employers: Employer[]): Promise<RunSummary> {
    if (this.state !== "idle") {
      throw new Error(`Orchestrator already used (state: ${this.state})`);
    }

    const { progressFilePath, crawlBatchSize } = this.deps;
    const keys = employers.map((e) => e.key);
    const start = resolveRunStart(loadRunProgress(progressFilePath, this.log), keys, {
      resume: this.deps.resume,
      batchSize: crawlBatchSize,
      now: this.now(),
    });

    this.log.info("Crawl run starting", {
      runId: this.deps.runId ?? null,
      employers: employers.length,
      startIndex: start.startIndex,
      startReason: start.reason,
      crawlBatchSize,
    });

    let progress: RunProgress = start.progress;
    let index = start.startIndex;
    let processed = 0;
    let stopReason: RunStopReason = "completed";
    let fatalError: string | undefined;
    const reports: EmployerReport[] = [];

    try {
      for (;;) {
        this.transition("selecting_employer");
        if (this.aborted()) {
          stopReason = "interrupted";
          break;
        }
        if (index >= employers.length) {
          stopReason = "completed";
          break;
        }
        if (processed >= crawlBatchSize) {
          stopReason = "batch_limit";
          break;
        }

        this.transition("crawling_employer");
        const report = await this.crawlEmployer(employers[index]);
        reports.push(report);

        this.transition("submitting");
        await this.deps.submitter.flush();

        if (report.outcome === "interrupted") {
          stopReason = "interrupted";
          break;
        }

        this.transition("checkpointing");
        const next = advanceRunProgress(progress, index, this.now());
        saveRunProgress(progressFilePath, next);
        progress = next;
        processed++;
        index++;
      }
    } catch (err) {
      stopReason = "fatal";
      fatalError = truncate(errorMessage(err), MAX_ERROR_MESSAGE_LENGTH);
      this.log.error("Crawl run aborted", { error: fatalError, state: this.state });
      await this.flushAfterFatal();
    }

    this.transition(stopReason === "interrupted" ? "interrupted" : "done");

    const summary = this.buildSummary(reports, {
      stopReason,
      startIndex: start.startIndex,
      nextIndex: progress.lastCompletedIndex + 1,
      processed,
      error: fatalError,
    });
    this.logSummary(summary);
    return summary;
  }

  /**
   * Forwarded records were already stored; try to deliver them anyway
   */
  private async flushAfterFatal(): Promise<void> {
    try {
      await this.deps.submitter.flush();
    } catch (err) {
      this.log.error("Flushing pending records after fatal error failed", {
        pending: this.deps.submitter.pendingCount(),
        error: errorMessage(err),
      });
    }
  }

  /**
   * Freshness → collect → extract (bounded pool) → merge → enqueue
   *
   * @throws Store failures (fatal to the run)
   */
  private async crawlEmployer(employer: Employer): Promise<EmployerReport> {
    const log = this.log;
    const jobLog = logger.withContext({ employerKey: employer.key }, log);
    const counters = emptyEmployerCounters();
    const freshness = evaluateEmployerFreshness(employer, this.deps.store, log);
    const report = (outcome: EmployerReport["outcome"], error?: string): EmployerReport => ({
      employerKey: employer.key,
      decision: freshness.decision,
      reason: freshness.reason,
      outcome,
      counters,
      ...(error !== undefined && { error }),
    });

    if (freshness.decision === "skip") {
      return report("skipped");
    }

    const urls: string[] = [];
    try {
      for await (const url of collectJobUrls(employer, {
        renderer: this.deps.renderer,
        renderTimeoutMs: this.deps.renderTimeoutMs,
        signal: this.deps.signal,
        log,
      })) {
        urls.push(url);
      }
    } catch (err) {
      if (!(err instanceof CollectionError)) {
        throw err;
      }
      if (this.aborted()) {
        return report("interrupted");
      }
      log.warn("URL collection failed", { employerKey: employer.key, error: err.message });
      return report("failed", truncate(err.message, MAX_ERROR_MESSAGE_LENGTH));
    }
    counters.collected = urls.length;

    if (this.aborted()) {
      return report("interrupted");
    }

    await mapWithConcurrency(
      urls,
      this.deps.extractionConcurrency,
      async (url) => {
        let outcome: ExtractionOutcome;
        try {
          outcome = await extractJob(url, employer, {
            renderer: this.deps.renderer,
            extractor: this.deps.extractor,
            renderTimeoutMs: this.deps.renderTimeoutMs,
            renderRetryTimeoutMs: this.deps.renderRetryTimeoutMs,
            signal: this.deps.signal,
            now: this.deps.now,
            log: jobLog,
          });
        } catch (err) {
          // URL-local: the run goes on
          counters.failed++;
          jobLog.warn("Job extraction threw", { sourceUrl: url, error: errorMessage(err) });
          return;
        }
        addMetrics(counters, outcome.metrics);
        await this.handleOutcome(employer, outcome, counters);
      },
      this.deps.signal,
    );

    return report(this.aborted() ? "interrupted" : "crawled");
  }

  private async handleOutcome(
    employer: Employer,
    outcome: ExtractionOutcome,
    counters: EmployerCounters,
  ): Promise<void> {
    switch (outcome.kind) {
      case "failed":
        counters.failed++;
        this.log.warn("Job extraction failed", {
          employerKey: employer.key,
          sourceUrl: outcome.failure.sourceUrl,
          reason: outcome.failure.reason,
          error: outcome.failure.message,
        });
        return;
      case "rejected":
        counters.rejected++;
        this.log.debug("Job rejected by filters", {
          employerKey: employer.key,
          sourceUrl: outcome.rejection.sourceUrl,
          reason: outcome.rejection.reason,
          detail: outcome.rejection.detail,
        });
        return;
      case "accepted": {
        const result = this.merge.process(outcome.record);
        if (result.constraintViolation) {
          counters.constraintViolations++;
        }
        switch (result.decision) {
          case "insert":
            counters.inserted++;
            break;
          case "update":
            counters.updated++;
            break;
          case "skip":
            counters.skipped++;
            break;
        }
        this.log.debug("Merge decision", {
          employerKey: employer.key,
          sourceUrl: result.sourceUrl,
          decision: result.decision,
          ...(result.reason && { reason: result.reason }),
        });
        if (result.forward) {
          await this.deps.submitter.enqueue(result.forward);
        }
        return;
      }
    }
  }

  private buildSummary(
    reports: EmployerReport[],
    run: {
      stopReason: RunStopReason;
      startIndex: number;
      nextIndex: number;
      processed: number;
      error?: string;
    },
  ): RunSummary {
    const totals = emptyEmployerCounters();
    for (const r of reports) {
      addCounters(totals, r.counters);
    }
    const submission = this.deps.submitter.counters();

    return {
      ...totals,
      runId: this.deps.runId ?? null,
      stopReason: run.stopReason,
      employersProcessed: run.processed,
      employersSkipped: reports.filter((r) => r.outcome === "skipped").length,
      employersFailed: reports.filter((r) => r.outcome === "failed").length,
      delivered: submission.recordsDelivered,
      submissionRejected: submission.recordsRejected,
      submissionFailed: submission.recordsFailed,
      startIndex: run.startIndex,
      nextIndex: run.nextIndex,
      employers: reports,
      ...(run.error !== undefined && { error: run.error }),
    };
  }

  private logSummary(summary: RunSummary): void {
    for (const r of summary.employers) {
      this.log.info("Employer report", {
        employerKey: r.employerKey,
        decision: r.decision,
        reason: r.reason,
        outcome: r.outcome,
        collected: r.counters.collected,
        inserted: r.counters.inserted,
        updated: r.counters.updated,
        skipped: r.counters.skipped,
        rejected: r.counters.rejected,
        failed: r.counters.failed,
        ...(r.error && { error: r.error }),
      });
    }

    const { employers, ...counts } = summary;
    const level = summary.stopReason === "fatal" ? "error" : "info";
    this.log[level]("Crawl run finished", { ...counts, employersReported: employers.length });
  }
}
