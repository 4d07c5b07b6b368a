/**
 * In-process stand-ins for the external collaborators
 *
 * - FakeRenderer: serves registered HTML per URL, can fail on demand
 * - FakeExtractor: scripted AI results per URL
 * - makeJobRecord: record builder with complete defaults
 * - createRecordingLogger: Logger capturing lines for assertions
 */

import type { ExtractedFields, JobRecord, Logger, LogMeta, PlatformHint, RenderedPage } from "@/types";
import type { Extractor, ExtractorUsage, Renderer } from "@/interfaces";
import { RenderError } from "@/clients/renderer";
import type { RenderFailureKind } from "@/clients/renderer";
import { ExtractionError } from "@/clients/openai";
import { htmlToText } from "@/utils";

/** 240 characters: above the completeness threshold */
export const LONG_DESCRIPTION = "Build and operate the systems that move data between teams. ".repeat(4);

export class FakeRenderer implements Renderer {
  readonly calls: Array<{ url: string; timeoutMs: number }> = [];
  private readonly pages = new Map<string, string>();
  private readonly failures = new Map<string, RenderFailureKind[]>();
  /** Runs before every render (e.g. to fire a stop signal mid-run) */
  beforeRender?: (url: string) => void;

  setPage(url: string, html: string): this {
    this.pages.set(url, html);
    return this;
  }

  /** Queue failures for the next renders of `url` */
  failNext(url: string, ...kinds: RenderFailureKind[]): this {
    this.failures.set(url, [...(this.failures.get(url) ?? []), ...kinds]);
    return this;
  }

  renderCount(url: string): number {
    return this.calls.filter((c) => c.url === url).length;
  }

  async render(url: string, timeoutMs: number): Promise<RenderedPage> {
    this.calls.push({ url, timeoutMs });
    this.beforeRender?.(url);

    const queued = this.failures.get(url);
    const failure = queued?.shift();
    if (failure) {
      throw new RenderError(url, failure, "scripted failure");
    }

    const html = this.pages.get(url);
    if (html === undefined) {
      throw new RenderError(url, "transport", "HTTP 404 Not Found");
    }
    return { url, html, text: htmlToText(html) };
  }
}

export class FakeExtractor implements Extractor {
  readonly calls: string[] = [];
  private readonly results = new Map<string, ExtractedFields>();
  private readonly counters: ExtractorUsage = {
    calls: 0,
    failures: 0,
    promptTokens: 0,
    completionTokens: 0,
  };

  setResult(url: string, fields: ExtractedFields): this {
    this.results.set(url, fields);
    return this;
  }

  async extract(_raw: string, _hint: PlatformHint, sourceUrl: string): Promise<ExtractedFields> {
    this.calls.push(sourceUrl);
    this.counters.calls++;
    const fields = this.results.get(sourceUrl);
    if (!fields) {
      this.counters.failures++;
      throw new ExtractionError(sourceUrl, "no scripted result");
    }
    return fields;
  }

  usage(): ExtractorUsage {
    return { ...this.counters };
  }
}

export function makeJobRecord(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    sourceUrl: "https://boards.greenhouse.io/acme/jobs/100",
    employerKey: "acme",
    title: "Backend Engineer",
    company: "Acme",
    aboutCompany: "",
    location: "San Francisco, CA",
    alternateLocations: [],
    employmentType: "Full time",
    aboutJob: LONG_DESCRIPTION,
    qualifications: "",
    benefits: "",
    salary: "",
    workEnvironment: "On-site",
    scrapedAt: "2026-01-05T10:00:00.000Z",
    sourceEmploymentPlatform: "greenhouse",
    ...overrides,
  };
}

export type LogLine = { level: keyof Logger; message: string; meta?: LogMeta };

export function createRecordingLogger(): Logger & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  const record =
    (level: keyof Logger) =>
    (message: string, meta?: LogMeta): void => {
      lines.push({ level, message, meta });
    };
  return {
    lines,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}
