/**
 * Crop Step
 *
 * Maps normalized detection boxes onto a page raster and cuts out the
 * region as its own PNG.
 */

import {
  errorMessage,
  type DetectionType,
  type NormalizedBox,
  type PixelBox,
  type RenderedPage,
  type StepResult,
} from "../core/types";
import { cropPng } from "../../images/png-utils";

export interface CropOutput {
  bboxPx: PixelBox;
  png: Buffer;
}

/**
 * Convert a normalized box to raster pixels. Each coordinate is rounded
 * independently, clamped to the page, and an axis that collapses is
 * widened by one pixel so the box always has area.
 */
export function toPixelBox(
  box: NormalizedBox,
  width: number,
  height: number
): PixelBox {
  if (width < 1 || height < 1) {
    throw new Error(`Cannot crop a ${width}x${height} page`);
  }
  const [x0, x1] = pixelSpan(box.x0, box.x1, width);
  const [y0, y1] = pixelSpan(box.y0, box.y1, height);
  return { x0, y0, x1, y1 };
}

function pixelSpan(a: number, b: number, size: number): [number, number] {
  const pa = clamp(Math.round(a * size), 0, size);
  const pb = clamp(Math.round(b * size), 0, size);
  let lo = Math.min(pa, pb);
  let hi = Math.max(pa, pb);
  if (lo === hi) {
    if (hi < size) hi += 1;
    else lo -= 1;
  }
  return [lo, hi];
}

function clamp(v: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, v));
}

/**
 * Crop one detection from a page. Never throws.
 */
export function cropDetection(
  page: RenderedPage,
  bboxNorm: NormalizedBox
): StepResult<CropOutput> {
  try {
    const bboxPx = toPixelBox(bboxNorm, page.width, page.height);
    const png = cropPng(page.pngBuffer, {
      left: bboxPx.x0,
      top: bboxPx.y0,
      width: bboxPx.x1 - bboxPx.x0,
      height: bboxPx.y1 - bboxPx.y0,
    });
    return { ok: true, value: { bboxPx, png } };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/** "figures/figure_p003_01.png" */
export function cropFileName(
  type: DetectionType,
  pageNumber: number,
  sequence: number
): string {
  const page = String(pageNumber).padStart(3, "0");
  const seq = String(sequence).padStart(2, "0");
  return `${type}s/${type}_p${page}_${seq}.png`;
}
