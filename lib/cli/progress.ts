/**
 * Console Progress Reporter
 *
 * Writes one timestamped line per pipeline event to stderr.
 */

import type {
  DocumentStepName,
  Progress,
  ProgressEvent,
} from "../pipeline/runner";

export interface ConsoleProgressOptions {
  stream?: { write(chunk: string): unknown };
  now?: () => Date;
}

export function createConsoleProgress(
  options: ConsoleProgressOptions = {}
): Progress {
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());

  return {
    emit(event) {
      stream.write(`[${formatTimestamp(now())}] ${formatEvent(event)}\n`);
    },
  };
}

export function formatEvent(event: ProgressEvent): string {
  switch (event.type) {
    case "run-start":
      return `Processing ${event.totalDocuments} PDFs into ${event.outputRoot}`;
    case "document-start":
      return `[${event.index}/${event.total}] ${event.documentId}`;
    case "step-start":
      return `${event.documentId}: ${formatStepName(event.step)}...`;
    case "render-progress":
      return `${event.documentId}: rendered page ${event.page}/${event.totalPages}`;
    case "step-complete":
      return `${event.documentId}: ${formatStepName(event.step)} done in ${formatDuration(event.durationMs)} (${event.message})`;
    case "step-error":
      return `${event.documentId}: ${formatStepName(event.step)} failed: ${event.error}`;
    case "batch-start": {
      const carry = event.carry ? `, carry "${event.carry}"` : "";
      return `${event.documentId}: batch ${event.batch}/${event.totalBatches} (pages ${event.pageStart}-${event.pageEnd}${carry})`;
    }
    case "batch-complete":
      return `${event.documentId}: batch ${event.batch}/${event.totalBatches} returned ${event.sections} sections in ${formatDuration(event.durationMs)}, next carry "${event.nextCarry}"`;
    case "batch-error":
      return `${event.documentId}: batch ${event.batch}/${event.totalBatches} failed: ${event.error}`;
    case "page-error":
      return `${event.documentId}: page ${event.page} ${event.kind} failed: ${event.error}`;
    case "document-complete": {
      const error = event.error ? `: ${event.error}` : "";
      return `${event.documentId}: ${event.status} in ${formatDuration(event.durationMs)}${error}`;
    }
    case "run-status":
      return (
        `${event.completed}/${event.total} done, ${event.remaining} remaining, ` +
        `elapsed ${formatDuration(event.elapsedMs)}, ` +
        `avg ${formatDuration(event.averageMs)}/doc, ` +
        `ETA ${formatDuration(event.etaMs)}`
      );
    case "run-complete": {
      const t = event.totals;
      return `Finished ${t.documents} documents (${t.complete} complete, ${t.partial} partial, ${t.failed} failed) in ${formatDuration(event.elapsedMs)}`;
    }
  }
}

function formatStepName(step: DocumentStepName): string {
  switch (step) {
    case "render":
      return "rendering";
    case "text-extraction":
      return "text extraction";
    case "layout-detection":
      return "layout detection";
    case "manifest":
      return "manifest";
  }
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}

/** "YYYY-MM-DD HH:MM:SS" in local time */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
