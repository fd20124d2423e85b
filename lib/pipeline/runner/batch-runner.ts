/**
 * Batch Runner
 *
 * Processes a list of PDFs one at a time, in input order, and writes the
 * run manifest once every document has been handled.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../core/types";
import type { RunManifest, RunManifestEntry } from "../core/schemas";
import {
  buildRunManifest,
  failedDocumentEntry,
  summarizeDocument,
} from "../steps";
import { uniqueDocumentIds } from "../slug";
import { processDocument } from "./document-runner";
import { RunStats } from "./run-stats";
import type { RunnerConfig } from "./types";

export interface RunResult {
  manifest: RunManifest;
  /** Absolute path of run_manifest.json */
  manifestFile: string;
}

/**
 * List the PDFs in a folder (case-insensitive extension), sorted by name.
 */
export async function listPdfs(dir: string, maxPdfs?: number): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const pdfs = entries
    .filter((e) => e.isFile() && path.extname(e.name).toLowerCase() === ".pdf")
    .map((e) => e.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => path.join(dir, name));
  return maxPdfs !== undefined ? pdfs.slice(0, maxPdfs) : pdfs;
}

export async function runDocuments(
  pdfPaths: string[],
  runner: RunnerConfig
): Promise<RunResult> {
  const { progress, storage } = runner;
  const clock = runner.clock ?? Date.now;
  const startedAt = new Date(clock());
  const stats = new RunStats(pdfPaths.length, clock);

  progress.emit({
    type: "run-start",
    totalDocuments: pdfPaths.length,
    outputRoot: storage.outputRoot,
  });

  const documentIds = uniqueDocumentIds(pdfPaths);
  const entries: RunManifestEntry[] = [];
  for (let i = 0; i < pdfPaths.length; i++) {
    const pdfPath = pdfPaths[i];
    const documentId = documentIds[i];
    const t0 = clock();

    progress.emit({
      type: "document-start",
      documentId,
      index: i + 1,
      total: pdfPaths.length,
    });

    try {
      const result = await processDocument(pdfPath, runner, documentId);
      entries.push(summarizeDocument(result.manifest, result.manifestFile));
      progress.emit({
        type: "document-complete",
        documentId,
        status: result.status,
        durationMs: clock() - t0,
        error: result.manifest.errors.render ?? undefined,
      });
    } catch (err) {
      const error = errorMessage(err);
      entries.push(failedDocumentEntry(pdfPath, error, documentId));
      progress.emit({
        type: "document-complete",
        documentId,
        status: "failed",
        durationMs: clock() - t0,
        error,
      });
    }

    stats.recordDocument();
    progress.emit({ type: "run-status", ...stats.snapshot() });
  }

  const manifest = buildRunManifest(entries, startedAt, new Date(clock()));
  const manifestFile = await storage.putRunManifest(manifest);

  progress.emit({
    type: "run-complete",
    totals: manifest.totals,
    manifestFile,
    elapsedMs: stats.snapshot().elapsedMs,
  });

  return { manifest, manifestFile };
}
