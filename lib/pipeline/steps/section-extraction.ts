/**
 * Section Extraction Step
 *
 * Extracts the title, authors and ordered section text of a document by
 * sending its page images to the model in fixed-size batches. A short
 * carry-over hint (the section presumed to continue past the batch) is
 * threaded from each batch into the next so that sections split across
 * batches are merged rather than duplicated.
 */

import {
  errorMessage,
  type LLMModel,
  type PageImageInput,
  type StepResult,
} from "../core/types";
import {
  textExtractionResponseSchema,
  type BatchError,
  type BatchRecord,
  type TextExtractionResponse,
} from "../core/schemas";
import { loadPrompt } from "../core/llm";

// ============================================================================
// Types
// ============================================================================

export interface MergedSection {
  /** Unique within the document */
  name: string;
  /** Name as reported by the model; continuations match on this */
  baseName: string;
  text: string;
}

export interface MergeState {
  title: string | null;
  authors: string[];
  sections: MergedSection[];
}

export type SectionExtractionProgress =
  | {
      type: "batch-start";
      batch: number;
      totalBatches: number;
      pageStart: number;
      pageEnd: number;
      carry: string;
    }
  | {
      type: "batch-complete";
      batch: number;
      totalBatches: number;
      sections: number;
      nextCarry: string;
      durationMs: number;
    }
  | {
      type: "batch-error";
      batch: number;
      totalBatches: number;
      error: string;
      durationMs: number;
    };

export interface ExtractBatchInput {
  pages: PageImageInput[];
  carry: string;
  /** 1-based */
  batch: number;
  totalBatches: number;
  model: LLMModel;
  promptName: string;
  documentId: string;
  maxRetries?: number;
}

export interface ExtractSectionsInput {
  pages: PageImageInput[];
  /** null = all pages */
  maxPages: number | null;
  pagesPerCall: number;
  model: LLMModel;
  promptName: string;
  documentId: string;
  maxRetries?: number;
  onProgress?: (event: SectionExtractionProgress) => void;
  clock?: () => number;
}

export interface SectionExtractionResult extends MergeState {
  batches: BatchRecord[];
  errors: BatchError[];
}

// ============================================================================
// Batch call
// ============================================================================

/**
 * Ask the model for the content of one page batch. Never throws: a call
 * or schema failure comes back as { ok: false }.
 */
export async function extractBatch(
  input: ExtractBatchInput
): Promise<StepResult<TextExtractionResponse>> {
  const { pages, carry, batch, totalBatches, model, promptName, documentId } =
    input;

  if (pages.length === 0) {
    return { ok: false, error: "Batch has no pages" };
  }

  try {
    const { system, messages } = await loadPrompt(promptName, {
      pages,
      carry,
      batch,
      total_batches: totalBatches,
      is_first_batch: batch === 1,
      page_start: pages[0].pageNumber,
      page_end: pages[pages.length - 1].pageNumber,
    });

    const result = await model.generateObject<TextExtractionResponse>({
      schema: textExtractionResponseSchema,
      system,
      messages,
      maxRetries: input.maxRetries,
      log: {
        taskType: "section-extraction",
        documentId,
        promptName,
        batch,
      },
    });

    return { ok: true, value: result.object };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

// ============================================================================
// Merge
// ============================================================================

export function emptyMergeState(): MergeState {
  return { title: null, authors: [], sections: [] };
}

/**
 * Fold one batch response into the document. Pure: returns a new state.
 *
 * - title and authors: first non-empty value wins
 * - an entry named like the current last section continues it
 * - any other entry starts a new section; a name already used by an
 *   earlier section gets a " (n)" suffix
 */
export function mergeBatch(
  state: MergeState,
  response: TextExtractionResponse
): MergeState {
  const responseTitle = response.title?.trim() ?? "";
  const title = state.title ?? (responseTitle || null);

  const responseAuthors = response.authors
    .map((a) => a.trim())
    .filter((a) => a.length > 0);
  const authors =
    state.authors.length > 0 ? state.authors : responseAuthors;

  const sections = state.sections.map((s) => ({ ...s }));
  for (const entry of response.sections) {
    const name = entry.name.trim();
    if (!name) continue;
    const text = entry.text.trim();

    const last = sections[sections.length - 1];
    if (last && last.baseName === name) {
      last.text = joinText(last.text, text);
      continue;
    }

    sections.push({ name: uniqueName(name, sections), baseName: name, text });
  }

  return { title, authors: [...authors], sections };
}

/**
 * Carry-over for the batch after a successful one. A null or blank
 * next_carry means the last section ended inside this batch.
 */
export function nextCarry(response: TextExtractionResponse): string {
  return response.next_carry?.trim() ?? "";
}

function joinText(existing: string, addition: string): string {
  if (!existing) return addition;
  if (!addition) return existing;
  return `${existing}\n\n${addition}`;
}

function uniqueName(name: string, sections: MergedSection[]): string {
  const taken = new Set(sections.map((s) => s.name));
  if (!taken.has(name)) return name;
  let n = 2;
  while (taken.has(`${name} (${n})`)) n++;
  return `${name} (${n})`;
}

// ============================================================================
// Batch loop
// ============================================================================

export function partitionPages<T>(pages: T[], size: number): T[][] {
  const batchSize = Math.max(1, Math.floor(size));
  const batches: T[][] = [];
  for (let i = 0; i < pages.length; i += batchSize) {
    batches.push(pages.slice(i, i + batchSize));
  }
  return batches;
}

/**
 * Run every batch in order, threading the carry-over and merging results.
 * A failed batch is recorded and skipped; the carry-over keeps its value.
 */
export async function extractSections(
  input: ExtractSectionsInput
): Promise<SectionExtractionResult> {
  const { model, promptName, documentId, onProgress } = input;
  const clock = input.clock ?? Date.now;

  const pages =
    input.maxPages === null ? input.pages : input.pages.slice(0, Math.max(0, input.maxPages));
  const batches = partitionPages(pages, input.pagesPerCall);
  const totalBatches = batches.length;

  let state = emptyMergeState();
  let carry = "";
  const records: BatchRecord[] = [];
  const errors: BatchError[] = [];

  for (let i = 0; i < batches.length; i++) {
    const batchPages = batches[i];
    const batch = i + 1;
    const pageStart = batchPages[0].pageNumber;
    const pageEnd = batchPages[batchPages.length - 1].pageNumber;

    onProgress?.({
      type: "batch-start",
      batch,
      totalBatches,
      pageStart,
      pageEnd,
      carry,
    });

    const t0 = clock();
    const result = await extractBatch({
      pages: batchPages,
      carry,
      batch,
      totalBatches,
      model,
      promptName,
      documentId,
      maxRetries: input.maxRetries,
    });
    const durationMs = clock() - t0;

    if (!result.ok) {
      errors.push({
        batch,
        page_start: pageStart,
        page_end: pageEnd,
        error: result.error,
      });
      records.push({
        batch,
        page_start: pageStart,
        page_end: pageEnd,
        carry_in: carry,
        carry_out: carry,
        sections: 0,
        duration_ms: durationMs,
        error: result.error,
      });
      onProgress?.({
        type: "batch-error",
        batch,
        totalBatches,
        error: result.error,
        durationMs,
      });
      continue;
    }

    const carryIn = carry;
    state = mergeBatch(state, result.value);
    carry = nextCarry(result.value);
    const sectionCount = result.value.sections.filter(
      (s) => s.name.trim().length > 0
    ).length;

    records.push({
      batch,
      page_start: pageStart,
      page_end: pageEnd,
      carry_in: carryIn,
      carry_out: carry,
      sections: sectionCount,
      duration_ms: durationMs,
      error: null,
    });
    onProgress?.({
      type: "batch-complete",
      batch,
      totalBatches,
      sections: sectionCount,
      nextCarry: carry,
      durationMs,
    });
  }

  return { ...state, batches: records, errors };
}
