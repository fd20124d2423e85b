/**
 * Pure pipeline step functions.
 *
 * Each step:
 * - Takes typed inputs
 * - Returns typed outputs (a StepResult for units that may fail)
 * - Has no side effects (no file I/O)
 * - Receives the LLM model as a parameter (if needed)
 */

export {
  extractSections,
  extractBatch,
  mergeBatch,
  nextCarry,
  emptyMergeState,
  partitionPages,
  type ExtractSectionsInput,
  type ExtractBatchInput,
  type SectionExtractionResult,
  type SectionExtractionProgress,
  type MergedSection,
  type MergeState,
} from "./section-extraction";

export {
  detectLayout,
  acceptDetections,
  validateDetections,
  normalizeBox,
  type DetectLayoutInput,
  type DetectedRegion,
} from "./layout-detection";

export {
  toPixelBox,
  cropDetection,
  cropFileName,
  type CropOutput,
} from "./crop";

export {
  createDocumentState,
  documentStatus,
  buildDocumentManifest,
  summarizeDocument,
  failedDocumentEntry,
  buildRunManifest,
  type DocumentState,
  type PageState,
} from "./manifest";
