/**
 * Core types for the extraction pipeline.
 *
 * These types define the data structures that flow through pipeline steps.
 * They are independent of storage, console output, or the model provider.
 */

import type { z } from "zod/v4";

// ============================================================================
// Pages - the unit the renderer produces and every step consumes
// ============================================================================

export interface RenderedPage {
  pageNumber: number; // 1-based
  pngBuffer: Buffer;
  width: number;
  height: number;
}

/** A page as handed to the model: number plus base64 PNG. */
export interface PageImageInput {
  pageNumber: number;
  imageBase64: string;
}

export function toPageImageInput(page: RenderedPage): PageImageInput {
  return {
    pageNumber: page.pageNumber,
    imageBase64: page.pngBuffer.toString("base64"),
  };
}

// ============================================================================
// Geometry
// ============================================================================

/** Region as fractions of the page size, top-left origin. */
export interface NormalizedBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** Region in page raster pixels, top-left origin, x1/y1 exclusive. */
export interface PixelBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export type DetectionType = "figure" | "table";

// ============================================================================
// Results - per unit of work (batch, page, item)
// ============================================================================

export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

// ============================================================================
// LLM Model - abstracted interface for language model calls
// ============================================================================

export interface LLMModel {
  generateObject<T>(
    options: GenerateObjectOptions<T>
  ): Promise<GenerateObjectResult<T>>;
}

export interface GenerateObjectOptions<T> {
  schema: z.ZodType<T>;
  system?: string;
  messages: Message[];
  validate?: (result: T) => ValidationResult;
  maxRetries?: number;
  /** Logging context - optional but recommended for debugging */
  log?: LLMCallContext;
}

export interface LLMCallContext {
  taskType: string;
  documentId: string;
  promptName: string;
  pageNumber?: number;
  batch?: number;
}

export interface GenerateObjectResult<T> {
  object: T;
  usage?: TokenUsage;
  cached?: boolean;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export type Message =
  | { role: "user"; content: string | ContentPart[] }
  | { role: "assistant"; content: string };

export type ContentPart = TextPart | ImagePart;

export interface TextPart {
  type: "text";
  text: string;
}

export interface ImagePart {
  type: "image";
  image: string; // base64 PNG
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
