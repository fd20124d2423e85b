/**
 * PDF page rendering.
 *
 * Rasterizes every page of a PDF to PNG using mupdf.
 */

import fs from "node:fs/promises";
import * as mupdf from "mupdf";
import { getPngMetadata } from "../images/png-utils";
import type { RenderedPage } from "../pipeline/core/types";

export interface RenderInput {
  /** PDF file contents as a Buffer */
  pdfBuffer: Buffer;
  /** Output resolution; 72 DPI is one pixel per PDF point */
  dpi: number;
}

export interface RenderProgress {
  page: number;
  totalPages: number;
}

const POINTS_PER_INCH = 72;

/**
 * Render all pages of a PDF, in page order, as RGB PNGs.
 */
export async function renderPdf(
  input: RenderInput,
  onProgress?: (progress: RenderProgress) => void
): Promise<RenderedPage[]> {
  const { pdfBuffer, dpi } = input;
  if (!Number.isFinite(dpi) || dpi <= 0) {
    throw new Error(`Invalid DPI: ${dpi}`);
  }

  const doc = openPdfFromBuffer(pdfBuffer);
  const totalPages = doc.countPages();
  const scale = dpi / POINTS_PER_INCH;
  const matrix = mupdf.Matrix.scale(scale, scale);

  const pages: RenderedPage[] = [];
  for (let i = 0; i < totalPages; i++) {
    const page = doc.loadPage(i);
    const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false);
    const pngBuffer = Buffer.from(pixmap.asPNG());
    const { width, height } = getPngMetadata(pngBuffer);
    pages.push({ pageNumber: i + 1, pngBuffer, width, height });

    onProgress?.({ page: i + 1, totalPages });
    await tick();
  }

  return pages;
}

/**
 * Read a PDF from disk and render it. This is the default page renderer.
 */
export async function renderPdfFile(
  pdfPath: string,
  dpi: number,
  onProgress?: (progress: RenderProgress) => void
): Promise<RenderedPage[]> {
  const pdfBuffer = await fs.readFile(pdfPath);
  return renderPdf({ pdfBuffer, dpi }, onProgress);
}

// Let pending I/O run between pages of large documents
const tick = () => new Promise<void>((r) => setImmediate(r));

function openPdfFromBuffer(buffer: Buffer): mupdf.Document {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}
