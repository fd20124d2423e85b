import fs from "node:fs";
import path from "node:path";
import type { LLMLogEntry } from "./core/llm";

export const LLM_LOG_FILE = "llm-log.jsonl";

const MAX_LOG_ENTRIES = 1000;

/**
 * Append a log entry to a JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LLMLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  // Trim if over limit
  const lines = fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(
      filePath,
      lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n"
    );
  }
}

/**
 * Build an onLog callback for createLLMModel that writes to the run's log.
 * Write failures are reported and never reach the pipeline.
 */
export function createLogWriter(
  filePath: string,
  warn: (message: string) => void = (m) => console.warn(m)
): (entry: LLMLogEntry) => void {
  return (entry) => {
    try {
      appendLogEntry(filePath, entry);
    } catch (err) {
      warn(
        `Failed to write LLM log entry: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  };
}
