import path from "node:path";

/** Relative names of the per-document files, as recorded in manifests. */
export const DOCUMENT_FILES = {
  title: "title.txt",
  authors: "authors.txt",
  textManifest: "text_manifest.json",
  manifest: "manifest.json",
} as const;

export const RUN_MANIFEST_FILE = "run_manifest.json";
export const CACHE_DIR = ".cache";

/** Absolute directory holding one document's output */
export function resolveDocumentDir(
  documentId: string,
  outputRoot = "output"
): string {
  return path.resolve(outputRoot, documentId);
}

/** "pages/page_001.png" */
export function pageImageFileName(pageNumber: number): string {
  return `pages/page_${String(pageNumber).padStart(3, "0")}.png`;
}
