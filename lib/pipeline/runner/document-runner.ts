/**
 * Document Runner
 *
 * Orchestrates one PDF through the pipeline:
 * 1. Render pages (and persist them when configured)
 * 2. Extract title, authors and sections in page batches
 * 3. Detect figures and tables per page, crop the accepted regions
 * 4. Build and write the document manifest
 *
 * Batch, page and crop failures (crop writes included) are recorded in the
 * manifest. A render failure skips steps 2 and 3. Other storage write
 * failures propagate.
 */

import {
  errorMessage,
  toPageImageInput,
  type DetectionType,
  type NormalizedBox,
  type PageImageInput,
  type PixelBox,
  type RenderedPage,
  type StepResult,
} from "../core/types";
import {
  buildDocumentManifest,
  createDocumentState,
  cropDetection,
  detectLayout,
  extractSections,
  type DocumentState,
} from "../steps";
import { documentIdFromPath } from "../slug";
import type {
  DocumentResult,
  DocumentStepName,
  DocumentStorage,
  RunnerConfig,
} from "./types";

/**
 * documentId defaults to the file name without extension; the batch runner
 * passes ids made unique across the run.
 */
export async function processDocument(
  pdfPath: string,
  runner: RunnerConfig,
  documentId = documentIdFromPath(pdfPath)
): Promise<DocumentResult> {
  const store = runner.storage.forDocument(documentId);
  const doc = createDocumentState(pdfPath, store.outputDir, documentId);

  const pages = await runRender(doc, store, runner);

  if (pages) {
    const inputs = pages.map(toPageImageInput);
    await runTextExtraction(doc, inputs, store, runner);
    await runLayoutDetection(doc, pages, inputs, store, runner);
  }

  return runStep(runner, doc.documentId, "manifest", async () => {
    const manifest = buildDocumentManifest(doc);
    const manifestFile = await store.putManifest(manifest);
    return {
      value: { manifest, status: manifest.status, manifestFile },
      message: `status ${manifest.status}`,
    };
  });
}

// ============================================================================
// Steps
// ============================================================================

async function runRender(
  doc: DocumentState,
  store: DocumentStorage,
  runner: RunnerConfig
): Promise<RenderedPage[] | null> {
  const { progress, settings } = runner;
  const clock = runner.clock ?? Date.now;

  progress.emit({ type: "step-start", documentId: doc.documentId, step: "render" });
  const t0 = clock();

  let pages: RenderedPage[];
  try {
    pages = await runner.renderer(doc.pdf, settings.render.dpi, (p) =>
      progress.emit({
        type: "render-progress",
        documentId: doc.documentId,
        page: p.page,
        totalPages: p.totalPages,
      })
    );
  } catch (err) {
    doc.renderError = errorMessage(err);
    progress.emit({
      type: "step-error",
      documentId: doc.documentId,
      step: "render",
      error: doc.renderError,
    });
    return null;
  }

  doc.pages = pages.map((p) => ({
    pageNumber: p.pageNumber,
    width: p.width,
    height: p.height,
    image: null,
    error: null,
    items: [],
    cropErrors: [],
  }));

  // A failed page image write aborts the document, unlike a render failure
  if (settings.render.keepPageImages) {
    try {
      for (let i = 0; i < pages.length; i++) {
        doc.pages[i].image = await store.putPageImage(
          pages[i].pageNumber,
          pages[i].pngBuffer
        );
      }
    } catch (err) {
      progress.emit({
        type: "step-error",
        documentId: doc.documentId,
        step: "render",
        error: errorMessage(err),
      });
      throw err;
    }
  }

  progress.emit({
    type: "step-complete",
    documentId: doc.documentId,
    step: "render",
    message: `${pages.length} pages at ${settings.render.dpi} dpi`,
    durationMs: clock() - t0,
  });
  return pages;
}

async function runTextExtraction(
  doc: DocumentState,
  pages: PageImageInput[],
  store: DocumentStorage,
  runner: RunnerConfig
): Promise<void> {
  const { progress } = runner;
  const settings = runner.settings.textExtraction;
  const documentId = doc.documentId;

  await runStep(runner, documentId, "text-extraction", async () => {
    const result = await extractSections({
      pages,
      maxPages: settings.maxPages,
      pagesPerCall: settings.pagesPerCall,
      model: runner.models.text,
      promptName: settings.promptName,
      documentId,
      maxRetries: settings.maxRetries,
      clock: runner.clock,
      onProgress: (event) => progress.emit({ ...event, documentId }),
    });

    doc.title = result.title;
    doc.authors = result.authors;
    doc.batchErrors = result.errors;
    doc.titleFile = await store.putTitle(result.title);
    doc.authorsFile = await store.putAuthors(result.authors);

    for (let i = 0; i < result.sections.length; i++) {
      const section = result.sections[i];
      const file = await store.putSection(i + 1, section.name, section.text);
      doc.sections.push({ name: section.name, file });
    }

    doc.textManifestFile = await store.putTextManifest({
      title: result.title,
      authors: result.authors,
      sections: result.sections.map((s) => ({ name: s.name, text: s.text })),
      batches: result.batches,
    });

    return {
      value: undefined,
      message:
        `${result.sections.length} sections from ${result.batches.length} batches` +
        (result.errors.length > 0 ? `, ${result.errors.length} failed` : ""),
    };
  });
}

async function runLayoutDetection(
  doc: DocumentState,
  pages: RenderedPage[],
  inputs: PageImageInput[],
  store: DocumentStorage,
  runner: RunnerConfig
): Promise<void> {
  const { progress } = runner;
  const settings = runner.settings.layoutDetection;
  const documentId = doc.documentId;

  await runStep(runner, documentId, "layout-detection", async () => {
    let figures = 0;
    let tables = 0;

    for (let i = 0; i < pages.length; i++) {
      const page = pages[i];
      const state = doc.pages[i];

      const detected = await detectLayout({
        page: inputs[i],
        minConfidence: settings.minConfidence,
        model: runner.models.detection,
        promptName: settings.promptName,
        documentId,
        maxRetries: settings.maxRetries,
      });

      if (!detected.ok) {
        state.error = detected.error;
        progress.emit({
          type: "page-error",
          documentId,
          page: page.pageNumber,
          kind: "detection",
          error: detected.error,
        });
        continue;
      }

      // Per-page, per-type sequence numbers follow detection order
      const sequence: Record<DetectionType, number> = { figure: 0, table: 0 };
      for (const region of detected.value) {
        sequence[region.type] += 1;

        const crop = await cropAndStore(
          page,
          region.type,
          region.bboxNorm,
          sequence[region.type],
          store
        );
        if (!crop.ok) {
          state.cropErrors.push({
            type: region.type,
            caption: region.caption,
            confidence: region.confidence,
            bbox_norm: region.bboxNorm,
            error: crop.error,
          });
          progress.emit({
            type: "page-error",
            documentId,
            page: page.pageNumber,
            kind: "crop",
            error: crop.error,
          });
          continue;
        }

        state.items.push({
          type: region.type,
          caption: region.caption,
          confidence: region.confidence,
          bbox_norm: region.bboxNorm,
          bbox_px: crop.value.bboxPx,
          image: crop.value.image,
        });
        if (region.type === "figure") figures++;
        else tables++;
      }
    }

    return {
      value: undefined,
      message: `${figures} figures, ${tables} tables on ${pages.length} pages`,
    };
  });
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Crop one region and write it. A write failure is a crop failure of that
 * item only.
 */
async function cropAndStore(
  page: RenderedPage,
  type: DetectionType,
  bboxNorm: NormalizedBox,
  sequence: number,
  store: DocumentStorage
): Promise<StepResult<{ bboxPx: PixelBox; image: string }>> {
  const crop = cropDetection(page, bboxNorm);
  if (!crop.ok) return crop;

  try {
    const image = await store.putCrop(type, page.pageNumber, sequence, crop.value.png);
    return { ok: true, value: { bboxPx: crop.value.bboxPx, image } };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/**
 * Wrap a step with start/complete/error events. Errors are rethrown.
 */
async function runStep<T>(
  runner: RunnerConfig,
  documentId: string,
  step: DocumentStepName,
  fn: () => Promise<{ value: T; message: string }>
): Promise<T> {
  const { progress } = runner;
  const clock = runner.clock ?? Date.now;

  progress.emit({ type: "step-start", documentId, step });
  const t0 = clock();
  try {
    const { value, message } = await fn();
    progress.emit({
      type: "step-complete",
      documentId,
      step,
      message,
      durationMs: clock() - t0,
    });
    return value;
  } catch (err) {
    progress.emit({
      type: "step-error",
      documentId,
      step,
      error: errorMessage(err),
    });
    throw err;
  }
}
