/**
 * Layout Detection Step
 *
 * One model call per page, asking for figure and table regions with a
 * confidence score and a normalized bounding box. Results are gated by
 * confidence and box geometry before anything is cropped.
 */

import {
  errorMessage,
  type DetectionType,
  type LLMModel,
  type NormalizedBox,
  type PageImageInput,
  type StepResult,
  type ValidationResult,
} from "../core/types";
import {
  detectionResponseSchema,
  type DetectionResponse,
  type DetectionResponseItem,
} from "../core/schemas";
import { loadPrompt } from "../core/llm";

export interface DetectedRegion {
  type: DetectionType;
  caption: string;
  confidence: number;
  bboxNorm: NormalizedBox;
}

export interface DetectLayoutInput {
  page: PageImageInput;
  minConfidence: number;
  model: LLMModel;
  promptName: string;
  documentId: string;
  maxRetries?: number;
}

/**
 * Detect figures and tables on one page. Never throws.
 */
export async function detectLayout(
  input: DetectLayoutInput
): Promise<StepResult<DetectedRegion[]>> {
  const { page, model, promptName, documentId } = input;

  try {
    const { system, messages } = await loadPrompt(promptName, { page });

    const result = await model.generateObject<DetectionResponse>({
      schema: detectionResponseSchema,
      system,
      messages,
      validate: validateDetections,
      maxRetries: input.maxRetries,
      log: {
        taskType: "layout-detection",
        documentId,
        promptName,
        pageNumber: page.pageNumber,
      },
    });

    return {
      ok: true,
      value: acceptDetections(result.object.items, input.minConfidence),
    };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/**
 * Reject responses whose numbers are unusable: a confidence outside [0, 1]
 * or a box coordinate that is not finite. Errors name the item by index.
 */
export function validateDetections(response: DetectionResponse): ValidationResult {
  const errors: string[] = [];
  response.items.forEach((item, i) => {
    if (!isUnitInterval(item.confidence)) {
      errors.push(`items[${i}].confidence must be between 0 and 1, got ${item.confidence}`);
    }
    for (const key of ["x0", "y0", "x1", "y1"] as const) {
      if (!Number.isFinite(item.bbox_norm[key])) {
        errors.push(`items[${i}].bbox_norm.${key} must be a finite number`);
      }
    }
  });
  return { valid: errors.length === 0, errors };
}

/**
 * Keep items with a confidence in [0, 1] at or above the threshold whose
 * box survives clamping, in the order the model returned them.
 */
export function acceptDetections(
  items: DetectionResponseItem[],
  minConfidence: number
): DetectedRegion[] {
  const accepted: DetectedRegion[] = [];
  for (const item of items) {
    if (!isUnitInterval(item.confidence) || item.confidence < minConfidence) {
      continue;
    }
    const bboxNorm = normalizeBox(item.bbox_norm);
    if (!bboxNorm) continue;

    accepted.push({
      type: item.type,
      caption: item.caption?.trim() ?? "",
      confidence: item.confidence,
      bboxNorm,
    });
  }
  return accepted;
}

/**
 * Clamp a box to the unit square. Returns null when a coordinate is not a
 * finite number or the clamped box has no area.
 */
export function normalizeBox(box: NormalizedBox): NormalizedBox | null {
  const coords = [box.x0, box.y0, box.x1, box.y1];
  if (!coords.every(Number.isFinite)) return null;

  const clamped = {
    x0: clamp01(box.x0),
    y0: clamp01(box.y0),
    x1: clamp01(box.x1),
    y1: clamp01(box.y1),
  };
  if (clamped.x0 >= clamped.x1 || clamped.y0 >= clamped.y1) return null;
  return clamped;
}

function isUnitInterval(v: number): boolean {
  return Number.isFinite(v) && v >= 0 && v <= 1;
}

function clamp01(v: number): number {
  return Math.min(1, Math.max(0, v));
}
