import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

const configSchema = z.object({
  provider: z.enum(["openai", "anthropic", "google"]).optional(),
  model: z.string().optional(),
  max_pdfs: z.number().int().min(1).optional(),
  render: z
    .object({
      dpi: z.number().positive().optional(),
      keep_page_images: z.boolean().optional(),
    })
    .optional(),
  text_extraction: z
    .object({
      prompt: z.string().optional(),
      model: z.string().optional(),
      pages_per_call: z.number().int().min(1).optional(),
      max_pages: z.number().int().min(1).nullable().optional(),
      max_retries: z.number().int().min(0).optional(),
    })
    .optional(),
  layout_detection: z
    .object({
      prompt: z.string().optional(),
      model: z.string().optional(),
      min_confidence: z.number().min(0).max(1).optional(),
      max_retries: z.number().int().min(0).optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof configSchema>;
export type Provider = NonNullable<AppConfig["provider"]>;

export const DEFAULT_CONFIG_FILE = "config.yaml";

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid config:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/**
 * Load config.yaml. An explicit path must exist; the default file in the
 * working directory is optional and its absence means an empty config.
 */
export function loadConfig(
  configPath?: string,
  overrides: Record<string, unknown> = {}
): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  let raw: unknown = {};
  if (configPath !== undefined || fs.existsSync(resolved)) {
    raw = yaml.load(fs.readFileSync(resolved, "utf-8")) ?? {};
  }
  if (!isPlainObject(raw)) {
    throw new Error(`Invalid config: ${resolved} must contain a YAML mapping`);
  }
  return parseConfig(deepMerge(raw, overrides));
}

// ============================================================================
// Resolved settings (defaults applied)
// ============================================================================

export interface RenderSettings {
  dpi: number;
  keepPageImages: boolean;
}

export interface TextExtractionSettings {
  promptName: string;
  model?: string;
  pagesPerCall: number;
  /** null = all pages */
  maxPages: number | null;
  maxRetries: number;
}

export interface LayoutDetectionSettings {
  promptName: string;
  model?: string;
  minConfidence: number;
  maxRetries: number;
}

export function getProvider(cfg: AppConfig): Provider {
  return cfg.provider ?? "openai";
}

export function getRenderSettings(cfg: AppConfig): RenderSettings {
  return {
    dpi: cfg.render?.dpi ?? 200,
    keepPageImages: cfg.render?.keep_page_images ?? true,
  };
}

export function getTextExtractionSettings(
  cfg: AppConfig
): TextExtractionSettings {
  const te = cfg.text_extraction;
  return {
    promptName: te?.prompt ?? "section_extraction",
    model: te?.model ?? cfg.model,
    pagesPerCall: te?.pages_per_call ?? 6,
    maxPages: te?.max_pages ?? null,
    maxRetries: te?.max_retries ?? 0,
  };
}

export function getLayoutDetectionSettings(
  cfg: AppConfig
): LayoutDetectionSettings {
  const ld = cfg.layout_detection;
  return {
    promptName: ld?.prompt ?? "layout_detection",
    model: ld?.model ?? cfg.model,
    minConfidence: ld?.min_confidence ?? 0.3,
    maxRetries: ld?.max_retries ?? 0,
  };
}
