/**
 * Manifest Builder
 *
 * Pure functions that turn a processed document into its manifest and
 * run-level summary entry. Nothing here mutates its input.
 */

import type {
  BatchError,
  CropError,
  DetectionRecord,
  DocumentManifest,
  DocumentStatus,
  RunManifest,
  RunManifestEntry,
  SectionRecord,
} from "../core/schemas";
import { documentIdFromPath } from "../slug";

// ============================================================================
// Document state (populated by the runner, read here)
// ============================================================================

export interface PageState {
  pageNumber: number;
  width: number;
  height: number;
  /** Relative path of the persisted page raster, null when not kept */
  image: string | null;
  error: string | null;
  items: DetectionRecord[];
  cropErrors: CropError[];
}

export interface DocumentState {
  documentId: string;
  pdf: string;
  outputDir: string;
  renderError: string | null;
  pages: PageState[];
  title: string | null;
  authors: string[];
  sections: SectionRecord[];
  titleFile: string | null;
  authorsFile: string | null;
  textManifestFile: string | null;
  batchErrors: BatchError[];
}

export function createDocumentState(
  pdf: string,
  outputDir: string,
  documentId = documentIdFromPath(pdf)
): DocumentState {
  return {
    documentId,
    pdf,
    outputDir,
    renderError: null,
    pages: [],
    title: null,
    authors: [],
    sections: [],
    titleFile: null,
    authorsFile: null,
    textManifestFile: null,
    batchErrors: [],
  };
}

// ============================================================================
// Per-document manifest
// ============================================================================

export function documentStatus(doc: DocumentState): DocumentStatus {
  if (doc.renderError !== null) return "render_failed";
  const hasErrors =
    doc.batchErrors.length > 0 ||
    doc.pages.some((p) => p.error !== null || p.cropErrors.length > 0);
  return hasErrors ? "partial" : "complete";
}

export function buildDocumentManifest(doc: DocumentState): DocumentManifest {
  const pages = [...doc.pages]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .map((p) => ({
      page: p.pageNumber,
      width: p.width,
      height: p.height,
      image: p.image,
      error: p.error,
      items: p.items.map((item) => ({ ...item })),
      crop_errors: p.cropErrors.map((e) => ({ ...e })),
    }));

  return {
    document_id: doc.documentId,
    pdf: doc.pdf,
    output_dir: doc.outputDir,
    status: documentStatus(doc),
    title: doc.title,
    authors: [...doc.authors],
    title_file: doc.titleFile,
    authors_file: doc.authorsFile,
    text_manifest_file: doc.textManifestFile,
    sections: doc.sections.map((s) => ({ ...s })),
    pages,
    errors: {
      render: doc.renderError,
      text_batches: doc.batchErrors.map((e) => ({ ...e })),
    },
  };
}

// ============================================================================
// Run manifest
// ============================================================================

export function summarizeDocument(
  manifest: DocumentManifest,
  manifestFile: string
): RunManifestEntry {
  const items = manifest.pages.flatMap((p) => p.items);
  return {
    document_id: manifest.document_id,
    pdf: manifest.pdf,
    status: manifest.status,
    manifest_file: manifestFile,
    title: manifest.title,
    pages: manifest.pages.map((p) => ({
      page: p.page,
      items: p.items.length,
      error: p.error,
    })),
    section_count: manifest.sections.length,
    figure_count: items.filter((i) => i.type === "figure").length,
    table_count: items.filter((i) => i.type === "table").length,
    error: manifest.errors.render,
  };
}

/** Entry for a document whose outputs could not be written. */
export function failedDocumentEntry(
  pdf: string,
  error: string,
  documentId = documentIdFromPath(pdf)
): RunManifestEntry {
  return {
    document_id: documentId,
    pdf,
    status: "failed",
    manifest_file: null,
    title: null,
    pages: [],
    section_count: 0,
    figure_count: 0,
    table_count: 0,
    error,
  };
}

export function buildRunManifest(
  entries: RunManifestEntry[],
  startedAt: Date,
  finishedAt: Date
): RunManifest {
  const count = (pred: (e: RunManifestEntry) => boolean) =>
    entries.filter(pred).length;
  const sum = (pick: (e: RunManifestEntry) => number) =>
    entries.reduce((acc, e) => acc + pick(e), 0);

  return {
    started_at: startedAt.toISOString(),
    finished_at: finishedAt.toISOString(),
    documents: entries.map((e) => ({ ...e, pages: e.pages.map((p) => ({ ...p })) })),
    totals: {
      documents: entries.length,
      complete: count((e) => e.status === "complete"),
      partial: count((e) => e.status === "partial"),
      failed: count((e) => e.status === "render_failed" || e.status === "failed"),
      pages: sum((e) => e.pages.length),
      sections: sum((e) => e.section_count),
      figures: sum((e) => e.figure_count),
      tables: sum((e) => e.table_count),
    },
  };
}
