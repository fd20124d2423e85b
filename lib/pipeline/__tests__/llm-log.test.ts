import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { appendLogEntry, createLogWriter } from "../llm-log";
import type { LLMLogEntry } from "../core/llm";

function entry(attempt: number): LLMLogEntry {
  return {
    taskType: "section-extraction",
    documentId: "paper",
    promptName: "section_extraction",
    batch: 1,
    timestamp: "2026-01-01T00:00:00.000Z",
    modelId: "test-model",
    cacheHit: false,
    attempt,
    durationMs: 5,
    messages: [],
  };
}

describe("appendLogEntry", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-log-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function readLines(file: string): LLMLogEntry[] {
    return fs
      .readFileSync(file, "utf-8")
      .split("\n")
      .filter(Boolean)
      .map((line) => JSON.parse(line));
  }

  it("appends one JSON line per entry, creating the directory", () => {
    const file = path.join(tmpDir, "nested", "llm-log.jsonl");

    appendLogEntry(file, entry(0));
    appendLogEntry(file, entry(1));

    expect(readLines(file).map((e) => e.attempt)).toEqual([0, 1]);
  });

  it("keeps only the newest 1000 entries", () => {
    const file = path.join(tmpDir, "llm-log.jsonl");
    fs.writeFileSync(
      file,
      Array.from({ length: 1000 }, (_, i) => JSON.stringify(entry(i))).join("\n") + "\n"
    );

    appendLogEntry(file, entry(1000));

    const lines = readLines(file);
    expect(lines).toHaveLength(1000);
    expect(lines[0].attempt).toBe(1);
    expect(lines[999].attempt).toBe(1000);
  });
});

describe("createLogWriter", () => {
  it("reports write failures instead of throwing", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-log-test-"));
    // A regular file where a directory is expected
    const blocker = path.join(tmpDir, "blocker");
    fs.writeFileSync(blocker, "");
    const warnings: string[] = [];

    const write = createLogWriter(path.join(blocker, "llm-log.jsonl"), (m) =>
      warnings.push(m)
    );
    write(entry(0));

    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith("Failed to write LLM log entry: ")).toBe(true);
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });
});
