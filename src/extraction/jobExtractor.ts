/**
 * Job extractor
 *
 * One posting URL → one ExtractionOutcome. Render (one retry with the
 * longer timeout on timeout or empty content), AI extraction when an
 * extractor is configured, the platform's rule-based extraction when AI is
 * unavailable or fails, then normalization and filters.
 */

import type {
  Employer,
  ExtractedFields,
  ExtractionMetrics,
  ExtractionOutcome,
  ExtractionSource,
  Logger,
  RenderedPage,
} from "@/types";
import type { Extractor, PlatformAdapter, Renderer } from "@/interfaces";
import { RenderError } from "@/clients/renderer";
import { resolvePostingAdapter } from "@/platforms";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";
import { normalizeCandidate } from "./normalizeCandidate";

export type JobExtractorDeps = {
  renderer: Renderer;
  /** null disables the AI step */
  extractor: Extractor | null;
  renderTimeoutMs: number;
  renderRetryTimeoutMs: number;
  signal?: AbortSignal;
  now?: () => Date;
  log?: Logger;
};

type RenderAttemptResult =
  | { ok: true; page: RenderedPage; attempts: number }
  | { ok: false; error: unknown; attempts: number };

function isRetryableRenderError(err: unknown): boolean {
  return err instanceof RenderError && (err.kind === "timeout" || err.kind === "empty");
}

async function renderWithRetry(url: string, deps: JobExtractorDeps, log: Logger): Promise<RenderAttemptResult> {
  try {
    const page = await deps.renderer.render(url, deps.renderTimeoutMs, deps.signal);
    return { ok: true, page, attempts: 1 };
  } catch (err) {
    if (!isRetryableRenderError(err) || deps.signal?.aborted) {
      return { ok: false, error: err, attempts: 1 };
    }
    log.debug("Render retry with longer timeout", {
      url,
      timeoutMs: deps.renderRetryTimeoutMs,
      error: errorMessage(err),
    });
  }

  try {
    const page = await deps.renderer.render(url, deps.renderRetryTimeoutMs, deps.signal);
    return { ok: true, page, attempts: 2 };
  } catch (err) {
    return { ok: false, error: err, attempts: 2 };
  }
}

/**
 * AI fields, or null when the AI step is disabled, fails or returns no title
 */
async function extractWithAi(
  extractor: Extractor,
  page: RenderedPage,
  adapter: PlatformAdapter,
  url: string,
  log: Logger,
): Promise<ExtractedFields | null> {
  try {
    const fields = await extractor.extract(page.text, adapter.platform, url);
    if (!fields.title || !fields.title.trim()) {
      log.warn("AI extraction returned no title, using rule-based extraction", { url });
      return null;
    }
    return fields;
  } catch (err) {
    log.warn("AI extraction failed, using rule-based extraction", {
      url,
      error: errorMessage(err),
    });
    return null;
  }
}

export async function extractJob(
  sourceUrl: string,
  employer: Employer,
  deps: JobExtractorDeps,
): Promise<ExtractionOutcome> {
  const log = deps.log ?? logger;
  const startedAt = Date.now();
  const metrics: ExtractionMetrics = {
    renderAttempts: 0,
    aiAttempted: false,
    aiSucceeded: false,
    fallbackUsed: false,
    durationMs: 0,
  };
  const finish = (): ExtractionMetrics => ({ ...metrics, durationMs: Date.now() - startedAt });

  const adapter = resolvePostingAdapter(sourceUrl, employer.platform);

  const rendered = await renderWithRetry(sourceUrl, deps, log);
  metrics.renderAttempts = rendered.attempts;
  if (!rendered.ok) {
    return {
      kind: "failed",
      failure: { sourceUrl, reason: "render_failed", message: errorMessage(rendered.error) },
      metrics: finish(),
    };
  }

  let fields: ExtractedFields | null = null;
  let source: ExtractionSource = "fallback";
  if (deps.extractor) {
    metrics.aiAttempted = true;
    fields = await extractWithAi(deps.extractor, rendered.page, adapter, sourceUrl, log);
    if (fields) {
      metrics.aiSucceeded = true;
      source = "ai";
    }
  }
  if (!fields) {
    metrics.fallbackUsed = true;
    fields = adapter.extractFallbackFields(rendered.page);
  }

  const candidate = normalizeCandidate(fields, {
    sourceUrl,
    employer,
    platform: adapter.platform,
    scrapedAt: (deps.now?.() ?? new Date()).toISOString(),
  });

  switch (candidate.kind) {
    case "missing_title":
      return {
        kind: "failed",
        failure: { sourceUrl, reason: "missing_title", message: `no title extracted (${source})` },
        metrics: finish(),
      };
    case "rejected":
      return { kind: "rejected", rejection: candidate.rejection, metrics: finish() };
    case "accepted":
      return { kind: "accepted", record: candidate.record, source, metrics: finish() };
  }
}
