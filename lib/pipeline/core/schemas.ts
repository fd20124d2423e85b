/**
 * Zod schemas for model responses and pipeline outputs.
 *
 * These schemas define the contracts between steps and are used for:
 * - Runtime validation of LLM outputs
 * - TypeScript type inference
 * - Manifest serialization
 */

import { z } from "zod/v4";

// ============================================================================
// Text extraction (one model call per page batch)
// ============================================================================

export const sectionEntrySchema = z.object({
  name: z.string(),
  text: z.string(),
});

export const textExtractionResponseSchema = z.object({
  title: z.string().nullable(),
  authors: z.array(z.string()),
  sections: z.array(sectionEntrySchema),
  next_carry: z.string().nullable(),
});

export type SectionEntry = z.infer<typeof sectionEntrySchema>;
export type TextExtractionResponse = z.infer<
  typeof textExtractionResponseSchema
>;

// ============================================================================
// Layout detection (one model call per page)
// ============================================================================

export const detectionTypeSchema = z.enum(["figure", "table"]);

export const normalizedBoxSchema = z.object({
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
});

export const detectionResponseItemSchema = z.object({
  type: detectionTypeSchema,
  caption: z.string().nullable(),
  confidence: z.number(),
  bbox_norm: normalizedBoxSchema,
});

export const detectionResponseSchema = z.object({
  items: z.array(detectionResponseItemSchema),
});

export type DetectionResponseItem = z.infer<typeof detectionResponseItemSchema>;
export type DetectionResponse = z.infer<typeof detectionResponseSchema>;

// ============================================================================
// Document manifest
// ============================================================================

export const pixelBoxSchema = z.object({
  x0: z.int(),
  y0: z.int(),
  x1: z.int(),
  y1: z.int(),
});

export const detectionRecordSchema = z.object({
  type: detectionTypeSchema,
  caption: z.string(),
  confidence: z.number(),
  bbox_norm: normalizedBoxSchema,
  bbox_px: pixelBoxSchema,
  image: z.string(),
});

export const cropErrorSchema = z.object({
  type: detectionTypeSchema,
  caption: z.string(),
  confidence: z.number(),
  bbox_norm: normalizedBoxSchema,
  error: z.string(),
});

export const pageRecordSchema = z.object({
  page: z.int(),
  width: z.int(),
  height: z.int(),
  image: z.string().nullable(),
  error: z.string().nullable(),
  items: z.array(detectionRecordSchema),
  crop_errors: z.array(cropErrorSchema),
});

export const sectionRecordSchema = z.object({
  name: z.string(),
  file: z.string(),
});

export const batchErrorSchema = z.object({
  batch: z.int(),
  page_start: z.int(),
  page_end: z.int(),
  error: z.string(),
});

export const documentStatusSchema = z.enum([
  "complete",
  "partial",
  "render_failed",
]);

export const documentManifestSchema = z.object({
  document_id: z.string(),
  pdf: z.string(),
  output_dir: z.string(),
  status: documentStatusSchema,
  title: z.string().nullable(),
  authors: z.array(z.string()),
  title_file: z.string().nullable(),
  authors_file: z.string().nullable(),
  text_manifest_file: z.string().nullable(),
  sections: z.array(sectionRecordSchema),
  pages: z.array(pageRecordSchema),
  errors: z.object({
    render: z.string().nullable(),
    text_batches: z.array(batchErrorSchema),
  }),
});

export type DetectionRecord = z.infer<typeof detectionRecordSchema>;
export type CropError = z.infer<typeof cropErrorSchema>;
export type PageRecord = z.infer<typeof pageRecordSchema>;
export type SectionRecord = z.infer<typeof sectionRecordSchema>;
export type BatchError = z.infer<typeof batchErrorSchema>;
export type DocumentStatus = z.infer<typeof documentStatusSchema>;
export type DocumentManifest = z.infer<typeof documentManifestSchema>;

// ============================================================================
// Text manifest (raw merged text, written beside the section files)
// ============================================================================

export const batchRecordSchema = z.object({
  batch: z.int(),
  page_start: z.int(),
  page_end: z.int(),
  carry_in: z.string(),
  carry_out: z.string(),
  sections: z.int(),
  duration_ms: z.number(),
  error: z.string().nullable(),
});

export const textManifestSchema = z.object({
  title: z.string().nullable(),
  authors: z.array(z.string()),
  sections: z.array(sectionEntrySchema),
  batches: z.array(batchRecordSchema),
});

export type BatchRecord = z.infer<typeof batchRecordSchema>;
export type TextManifest = z.infer<typeof textManifestSchema>;

// ============================================================================
// Run manifest
// ============================================================================

export const runEntryStatusSchema = z.enum([
  "complete",
  "partial",
  "render_failed",
  "failed",
]);

export const runManifestEntrySchema = z.object({
  document_id: z.string(),
  pdf: z.string(),
  status: runEntryStatusSchema,
  manifest_file: z.string().nullable(),
  title: z.string().nullable(),
  pages: z.array(
    z.object({
      page: z.int(),
      items: z.int(),
      error: z.string().nullable(),
    })
  ),
  section_count: z.int(),
  figure_count: z.int(),
  table_count: z.int(),
  error: z.string().nullable(),
});

export const runManifestSchema = z.object({
  started_at: z.string(),
  finished_at: z.string(),
  documents: z.array(runManifestEntrySchema),
  totals: z.object({
    documents: z.int(),
    complete: z.int(),
    partial: z.int(),
    failed: z.int(),
    pages: z.int(),
    sections: z.int(),
    figures: z.int(),
    tables: z.int(),
  }),
});

export type RunEntryStatus = z.infer<typeof runEntryStatusSchema>;
export type RunManifestEntry = z.infer<typeof runManifestEntrySchema>;
export type RunManifest = z.infer<typeof runManifestSchema>;
