/**
 * Unit tests for run progress checkpointing
 */

import { describe, it, expect, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  advanceRunProgress,
  createRunProgress,
  loadRunProgress,
  parseRunProgress,
  resolveRunStart,
  saveRunProgress,
} from "@/orchestration";
import { createRecordingLogger } from "../helpers/fakes";

const NOW = new Date("2026-01-05T10:00:00.000Z");
const LATER = new Date("2026-01-05T11:00:00.000Z");
const KEYS = ["acme", "globex", "initech"];

describe("resolveRunStart", () => {
  it("starts a fresh cycle without stored progress", () => {
    const start = resolveRunStart(null, KEYS, { resume: true, batchSize: 2, now: NOW });
    expect(start.startIndex).toBe(0);
    expect(start.reason).toBe("no_progress");
    expect(start.progress).toEqual({
      version: 1,
      employers: KEYS,
      lastCompletedIndex: -1,
      batchSize: 2,
      cycleStartedAt: "2026-01-05T10:00:00.000Z",
      updatedAt: "2026-01-05T10:00:00.000Z",
      completedAt: null,
    });
  });

  it("resumes after the last completed employer", () => {
    const stored = advanceRunProgress(createRunProgress(KEYS, 1, NOW), 0, NOW);
    const start = resolveRunStart(stored, KEYS, { resume: true, batchSize: 2, now: LATER });
    expect(start.reason).toBe("resumed");
    expect(start.startIndex).toBe(1);
    expect(start.progress.batchSize).toBe(2);
    expect(start.progress.cycleStartedAt).toBe("2026-01-05T10:00:00.000Z");
  });

  it("restarts when resume is off, employers changed or the cycle finished", () => {
    const stored = advanceRunProgress(createRunProgress(KEYS, 1, NOW), 0, NOW);
    expect(resolveRunStart(stored, KEYS, { resume: false, batchSize: 1, now: LATER }).reason).toBe(
      "resume_disabled",
    );
    expect(
      resolveRunStart(stored, ["acme", "initech"], { resume: true, batchSize: 1, now: LATER }).reason,
    ).toBe("employers_changed");

    const finished = advanceRunProgress(stored, 2, LATER);
    const start = resolveRunStart(finished, KEYS, { resume: true, batchSize: 1, now: LATER });
    expect(start.reason).toBe("new_cycle");
    expect(start.startIndex).toBe(0);
    expect(start.progress.cycleStartedAt).toBe("2026-01-05T11:00:00.000Z");
  });
});

describe("advanceRunProgress", () => {
  it("sets completedAt only at the last employer", () => {
    const progress = createRunProgress(KEYS, 3, NOW);
    expect(advanceRunProgress(progress, 1, LATER).completedAt).toBeNull();
    expect(advanceRunProgress(progress, 2, LATER).completedAt).toBe("2026-01-05T11:00:00.000Z");
  });
});

describe("parseRunProgress", () => {
  it("rejects other versions and malformed fields", () => {
    const valid = createRunProgress(KEYS, 3, NOW);
    expect(parseRunProgress(valid)).toEqual(valid);
    expect(parseRunProgress({ ...valid, version: 2 })).toBeNull();
    expect(parseRunProgress({ ...valid, lastCompletedIndex: -2 })).toBeNull();
    expect(parseRunProgress({ ...valid, employers: ["acme", 3] })).toBeNull();
    expect(parseRunProgress("progress")).toBeNull();
  });
});

describe("progress file", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  function tempFile(name: string): string {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "crawl-progress-"));
    return path.join(dir, name);
  }

  it("saves and loads progress", () => {
    const filePath = tempFile(path.join("nested", "progress.json"));
    const progress = advanceRunProgress(createRunProgress(KEYS, 2, NOW), 1, LATER);

    saveRunProgress(filePath, progress);

    expect(loadRunProgress(filePath)).toEqual(progress);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(["progress.json"]);
  });

  it("returns null for a missing file", () => {
    expect(loadRunProgress(tempFile("absent.json"))).toBeNull();
  });

  it("ignores a corrupt file with a warning", () => {
    const filePath = tempFile("progress.json");
    fs.writeFileSync(filePath, "{ half-written", "utf-8");
    const log = createRecordingLogger();

    expect(loadRunProgress(filePath, log)).toBeNull();
    expect(log.lines.map((l) => [l.level, l.message])).toEqual([
      ["warn", "Ignoring unreadable run progress file"],
    ]);
  });
});
