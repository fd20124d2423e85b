/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pure pipeline steps
 * and the infrastructure (rendering, storage, progress emission).
 */

import type { DetectionType, LLMModel, RenderedPage } from "../core/types";
import type {
  DocumentManifest,
  DocumentStatus,
  RunEntryStatus,
  RunManifest,
  TextManifest,
} from "../core/schemas";
import type { RenderProgress } from "../../pdf/render";
import type {
  LayoutDetectionSettings,
  RenderSettings,
  TextExtractionSettings,
} from "../../config";

// ============================================================================
// Storage Interface
// ============================================================================

/**
 * Writes the files of one document. Every method returns the path it
 * wrote, relative to the document directory, except putManifest which
 * returns it relative to the output root.
 *
 * Write failures throw; the batch runner records them on the document.
 */
export interface DocumentStorage {
  readonly documentId: string;
  /** Absolute path of the document directory */
  readonly outputDir: string;

  putPageImage(pageNumber: number, png: Buffer): Promise<string>;
  putTitle(title: string | null): Promise<string>;
  putAuthors(authors: string[]): Promise<string>;
  /** index is the 1-based position of the section */
  putSection(index: number, name: string, text: string): Promise<string>;
  putTextManifest(manifest: TextManifest): Promise<string>;
  putCrop(
    type: DetectionType,
    pageNumber: number,
    sequence: number,
    png: Buffer
  ): Promise<string>;
  putManifest(manifest: DocumentManifest): Promise<string>;
}

export interface OutputStorage {
  /** Absolute path of the output root */
  readonly outputRoot: string;
  forDocument(documentId: string): DocumentStorage;
  /** Returns the absolute path written */
  putRunManifest(manifest: RunManifest): Promise<string>;
}

// ============================================================================
// Page renderer
// ============================================================================

/** onPage is called after each page is rasterized */
export type PageRenderer = (
  pdfPath: string,
  dpi: number,
  onPage?: (progress: RenderProgress) => void
) => Promise<RenderedPage[]>;

// ============================================================================
// Progress Interface
// ============================================================================

export type DocumentStepName =
  | "render"
  | "text-extraction"
  | "layout-detection"
  | "manifest";

export type ProgressEvent =
  // Run-level events
  | { type: "run-start"; totalDocuments: number; outputRoot: string }
  | {
      type: "run-status";
      completed: number;
      total: number;
      remaining: number;
      elapsedMs: number;
      averageMs: number;
      etaMs: number;
    }
  | {
      type: "run-complete";
      totals: RunManifest["totals"];
      manifestFile: string;
      elapsedMs: number;
    }
  // Document-level events
  | {
      type: "document-start";
      documentId: string;
      index: number;
      total: number;
    }
  | {
      type: "document-complete";
      documentId: string;
      status: RunEntryStatus;
      durationMs: number;
      error?: string;
    }
  | { type: "step-start"; documentId: string; step: DocumentStepName }
  | {
      type: "render-progress";
      documentId: string;
      page: number;
      totalPages: number;
    }
  | {
      type: "step-complete";
      documentId: string;
      step: DocumentStepName;
      message: string;
      durationMs: number;
    }
  | {
      type: "step-error";
      documentId: string;
      step: DocumentStepName;
      error: string;
    }
  // Text extraction batches
  | {
      type: "batch-start";
      documentId: string;
      batch: number;
      totalBatches: number;
      pageStart: number;
      pageEnd: number;
      carry: string;
    }
  | {
      type: "batch-complete";
      documentId: string;
      batch: number;
      totalBatches: number;
      sections: number;
      nextCarry: string;
      durationMs: number;
    }
  | {
      type: "batch-error";
      documentId: string;
      batch: number;
      totalBatches: number;
      error: string;
      durationMs: number;
    }
  // Per-page detection and cropping
  | {
      type: "page-error";
      documentId: string;
      page: number;
      kind: "detection" | "crop";
      error: string;
    };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, collect events in tests, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

// ============================================================================
// Runner Configuration
// ============================================================================

export interface PipelineSettings {
  render: RenderSettings;
  textExtraction: TextExtractionSettings;
  layoutDetection: LayoutDetectionSettings;
}

export interface RunnerConfig {
  storage: OutputStorage;
  progress: Progress;
  models: {
    text: LLMModel;
    detection: LLMModel;
  };
  renderer: PageRenderer;
  settings: PipelineSettings;
  clock?: () => number;
}

export interface DocumentResult {
  manifest: DocumentManifest;
  status: DocumentStatus;
  /** Relative to the output root */
  manifestFile: string;
}
