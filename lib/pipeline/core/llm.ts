/**
 * LLM abstraction with caching support.
 *
 * This module provides a clean interface for LLM calls that:
 * - Wraps the Vercel AI SDK
 * - Validates every response against its zod schema
 * - Handles disk-based caching of responses
 * - Supports validation with retry loops
 * - Logs all calls for debugging
 */

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import {
  generateObject,
  type LanguageModel,
  type ModelMessage,
  type UserContent,
} from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { z } from "zod/v4";
import type {
  ContentPart,
  GenerateObjectOptions,
  GenerateObjectResult,
  LLMCallContext,
  LLMModel,
  Message,
  TokenUsage,
} from "./types";
import { renderPrompt } from "../prompt";

// ============================================================================
// Provider types and model resolution
// ============================================================================

export type LLMProvider = "openai" | "anthropic" | "google";

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-5.2",
  anthropic: "claude-sonnet-4-20250514",
  google: "gemini-2.5-pro",
};

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openai: (id) => openai(id),
  anthropic: (id) => anthropic(id),
  google: (id) => google(id),
};

export function isLLMProvider(value: string): value is LLMProvider {
  return value === "openai" || value === "anthropic" || value === "google";
}

/**
 * Resolve the model id that will be sent to the provider.
 * Accepts "model-id" (uses the given provider) or "provider:model-id".
 */
export function resolveModelId(
  provider: LLMProvider,
  modelId?: string
): { provider: LLMProvider; modelId: string } {
  if (!modelId) return { provider, modelId: DEFAULT_MODELS[provider] };

  const colonIdx = modelId.indexOf(":");
  if (colonIdx !== -1) {
    const prefix = modelId.slice(0, colonIdx);
    if (isLLMProvider(prefix)) {
      return { provider: prefix, modelId: modelId.slice(colonIdx + 1) };
    }
  }
  return { provider, modelId };
}

export function resolveLanguageModel(
  provider: LLMProvider,
  modelId?: string
): LanguageModel {
  const resolved = resolveModelId(provider, modelId);
  return MODEL_FACTORIES[resolved.provider](resolved.modelId);
}

// ============================================================================
// LLM Model factory
// ============================================================================

export interface CreateLLMModelOptions {
  provider: LLMProvider;
  modelId?: string;
  /** Use this model instead of resolving one from the provider */
  languageModel?: LanguageModel;
  cacheDir?: string;
  skipCache?: boolean;
  onLog?: (entry: LLMLogEntry) => void;
}

export interface LLMLogEntry extends LLMCallContext {
  timestamp: string;
  modelId: string;
  cacheHit: boolean;
  attempt: number;
  durationMs: number;
  usage?: TokenUsage;
  validationErrors?: string[];
  system?: string;
  messages: LLMLogMessage[];
}

export interface LLMLogMessage {
  role: string;
  content: LLMLogContentPart[];
}

export type LLMLogContentPart =
  | { type: "text"; text: string }
  | {
      type: "image";
      // Image metadata instead of the full base64 payload
      width: number;
      height: number;
      byteLength: number;
      hash: string;
    };

/**
 * Create an LLMModel instance with optional caching.
 *
 * This is the main entry point for creating LLM clients in the pipeline.
 */
export function createLLMModel(options: CreateLLMModelOptions): LLMModel {
  const resolved = resolveModelId(options.provider, options.modelId);
  const languageModel =
    options.languageModel ?? resolveLanguageModel(options.provider, options.modelId);
  const modelId =
    typeof languageModel === "string" ? languageModel : resolved.modelId;

  return {
    async generateObject<T>(
      opts: GenerateObjectOptions<T>
    ): Promise<GenerateObjectResult<T>> {
      const cacheDir = options.cacheDir;
      const maxRetries = opts.maxRetries ?? 0;
      const jsonSchema = z.toJSONSchema(opts.schema);
      const t0 = Date.now();

      let currentMessages = opts.messages;
      const allErrors: string[] = [];
      const totalUsage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

      const log = (cacheHit: boolean, attempt: number) => {
        if (!opts.log) return;
        options.onLog?.({
          ...opts.log,
          timestamp: new Date().toISOString(),
          modelId,
          cacheHit,
          attempt,
          durationMs: Date.now() - t0,
          usage:
            totalUsage.inputTokens > 0 || totalUsage.outputTokens > 0
              ? { ...totalUsage }
              : undefined,
          validationErrors: allErrors.length > 0 ? [...allErrors] : undefined,
          system: opts.system,
          messages: messagesToLogFormat(currentMessages),
        });
      };

      for (let attempt = 0; attempt <= maxRetries; attempt++) {
        const hash = computeHash({
          modelId,
          system: opts.system,
          messages: currentMessages,
          schema: jsonSchema,
        });

        const cacheFile = cacheDir ? path.join(cacheDir, `${hash}.json`) : null;

        try {
          let result: T | undefined;
          let cacheHit = false;

          // Check cache; an entry that no longer matches the schema is a miss
          if (
            cacheFile &&
            !options.skipCache &&
            !process.env.RECACHE &&
            fs.existsSync(cacheFile)
          ) {
            const cached = opts.schema.safeParse(
              JSON.parse(fs.readFileSync(cacheFile, "utf-8"))
            );
            if (cached.success) {
              result = cached.data;
              cacheHit = true;
            }
          }

          if (result === undefined) {
            const generated = await generateObject({
              model: languageModel,
              output: "object",
              schema: opts.schema,
              system: opts.system,
              messages: toModelMessages(currentMessages),
            });

            totalUsage.inputTokens += generated.usage.inputTokens ?? 0;
            totalUsage.outputTokens += generated.usage.outputTokens ?? 0;

            const parsed = opts.schema.safeParse(generated.object);
            if (!parsed.success) {
              throw new Error(
                `Response does not match schema: ${z.prettifyError(parsed.error)}`
              );
            }
            result = parsed.data;

            if (cacheFile) {
              fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
              fs.writeFileSync(
                cacheFile,
                JSON.stringify(result, null, 2) + "\n"
              );
            }
          }

          // Validate if validator provided
          if (opts.validate) {
            const check = opts.validate(result);
            if (!check.valid) {
              allErrors.push(...check.errors);

              // Bust cache and retry with feedback
              if (cacheFile) bustCache(cacheFile);
              currentMessages = appendValidationFeedback(
                currentMessages,
                result,
                check.errors
              );
              continue;
            }
          }

          log(cacheHit, attempt);

          return {
            object: result,
            usage: totalUsage,
            cached: cacheHit,
          };
        } catch (err) {
          const errMsg = err instanceof Error ? err.message : String(err);
          allErrors.push(errMsg);
          if (cacheFile) bustCache(cacheFile);

          if (attempt === maxRetries) {
            log(false, attempt);
            throw err;
          }
        }
      }

      log(false, maxRetries);
      throw new Error(
        `Validation failed after ${maxRetries + 1} attempts. Errors:\n${allErrors.join("\n")}`
      );
    },
  };
}

// ============================================================================
// Prompt loading helper
// ============================================================================

/**
 * Load and render a Liquid prompt template, returning messages in our format.
 */
export async function loadPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<{ system?: string; messages: Message[] }> {
  const promptMessages = await renderPrompt(templateName, context);

  let system: string | undefined;
  const messages: Message[] = [];
  for (const m of promptMessages) {
    if (m.role === "system") {
      system = typeof m.content === "string" ? m.content : partsToText(m.content);
    } else if (m.role === "assistant") {
      messages.push({
        role: "assistant",
        content: typeof m.content === "string" ? m.content : partsToText(m.content),
      });
    } else {
      messages.push({ role: "user", content: m.content });
    }
  }

  return { system, messages };
}

// ============================================================================
// Internal helpers
// ============================================================================

function computeHash(data: {
  modelId: string;
  system?: string;
  messages: Message[];
  schema: unknown;
}): string {
  const json = JSON.stringify(data);
  return crypto.createHash("sha256").update(json).digest("hex");
}

function bustCache(cacheFile: string): void {
  fs.rmSync(cacheFile, { force: true });
}

function partsToText(parts: ContentPart[]): string {
  return parts
    .flatMap((p) => (p.type === "text" ? [p.text] : []))
    .join("\n");
}

function toModelMessages(messages: Message[]): ModelMessage[] {
  return messages.map((m): ModelMessage => {
    if (m.role === "assistant") {
      return { role: "assistant", content: m.content };
    }
    if (typeof m.content === "string") {
      return { role: "user", content: m.content };
    }
    const parts: UserContent = m.content.map((p) =>
      p.type === "text"
        ? { type: "text" as const, text: p.text }
        : { type: "image" as const, image: p.image, mediaType: "image/png" }
    );
    return { role: "user", content: parts };
  });
}

function appendValidationFeedback<T>(
  messages: Message[],
  failedResult: T,
  errors: string[]
): Message[] {
  return [
    ...messages,
    {
      role: "assistant",
      content: JSON.stringify(failedResult, null, 2),
    },
    {
      role: "user",
      content:
        "Your previous response failed validation with these errors:\n" +
        errors.map((e) => `- ${e}`).join("\n") +
        "\n\nPlease fix these issues and try again.",
    },
  ];
}

/**
 * Convert messages to log format, replacing image data with metadata.
 */
export function messagesToLogFormat(messages: Message[]): LLMLogMessage[] {
  return messages.map((m) => {
    if (typeof m.content === "string") {
      return {
        role: m.role,
        content: [{ type: "text" as const, text: m.content }],
      };
    }

    const content: LLMLogContentPart[] = m.content.map((p) => {
      if (p.type === "text") {
        return { type: "text" as const, text: p.text };
      }
      const base64 = p.image;
      const { width, height } = pngDimensions(base64);
      return {
        type: "image" as const,
        width,
        height,
        byteLength: Math.round((base64.length * 3) / 4),
        hash: crypto.createHash("sha256").update(base64).digest("hex").slice(0, 16),
      };
    });

    return { role: m.role, content };
  });
}

/**
 * Read PNG width and height from the IHDR chunk of a base64-encoded PNG.
 * Width is at byte offset 16, height at 20 (both big-endian uint32);
 * the first 32 base64 chars cover those 24 bytes.
 */
function pngDimensions(base64: string): { width: number; height: number } {
  const buf = Buffer.from(base64.slice(0, 32), "base64");
  if (buf.length < 24) return { width: 0, height: 0 };
  return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}
