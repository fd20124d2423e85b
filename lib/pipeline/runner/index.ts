/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer for running pure pipeline steps
 * with storage and progress tracking.
 */

export {
  type DocumentStorage,
  type OutputStorage,
  type PageRenderer,
  type Progress,
  type ProgressEvent,
  type DocumentStepName,
  type PipelineSettings,
  type RunnerConfig,
  type DocumentResult,
  nullProgress,
} from "./types";

export { processDocument } from "./document-runner";
export { runDocuments, listPdfs, type RunResult } from "./batch-runner";
export { RunStats } from "./run-stats";
export { createFileStorage } from "./storage-adapter";

// Re-export factory for convenient setup
export { createRunner, type CreateRunnerOptions } from "./factory";
