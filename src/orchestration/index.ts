export { RunOrchestrator, emptyEmployerCounters } from "./runOrchestrator";
export type { RunOrchestratorDeps } from "./runOrchestrator";
export { runCrawl } from "./crawlRunner";
export type { CrawlRunnerDeps } from "./crawlRunner";
export {
  CheckpointError,
  advanceRunProgress,
  createRunProgress,
  loadRunProgress,
  parseRunProgress,
  resolveRunStart,
  saveRunProgress,
} from "./runProgress";
export type { ProgressStart, ProgressStartReason } from "./runProgress";
export { startCrawlRun, finishCrawlRunWithSummary, failCrawlRun, summaryCounters } from "./runLifecycle";
