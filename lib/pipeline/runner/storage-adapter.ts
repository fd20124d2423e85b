/**
 * Storage Adapter
 *
 * Implements the OutputStorage interface on the filesystem. Layout under
 * the output root:
 *
 *   <document_id>/pages/page_001.png
 *   <document_id>/title.txt, authors.txt, text_manifest.json
 *   <document_id>/sections/01_<slug>.txt
 *   <document_id>/figures/figure_p003_01.png, tables/table_p003_02.png
 *   <document_id>/manifest.json
 *   run_manifest.json
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { DocumentStorage, OutputStorage } from "./types";
import {
  DOCUMENT_FILES,
  RUN_MANIFEST_FILE,
  pageImageFileName,
  resolveDocumentDir,
} from "../types";
import { sectionFileName } from "../slug";
import { cropFileName } from "../steps/crop";

export function createFileStorage(outputRoot: string): OutputStorage {
  const root = path.resolve(outputRoot);

  return {
    outputRoot: root,

    forDocument(documentId: string): DocumentStorage {
      return createDocumentStorage(root, documentId);
    },

    async putRunManifest(manifest) {
      const file = path.join(root, RUN_MANIFEST_FILE);
      await writeFile(file, toJson(manifest));
      return file;
    },
  };
}

function createDocumentStorage(
  outputRoot: string,
  documentId: string
): DocumentStorage {
  const documentDir = resolveDocumentDir(documentId, outputRoot);

  // Writes a file under the document directory; returns its relative path
  async function put(relative: string, data: string | Buffer): Promise<string> {
    await writeFile(path.join(documentDir, relative), data);
    return relative;
  }

  return {
    documentId,
    outputDir: documentDir,

    putPageImage(pageNumber, png) {
      return put(pageImageFileName(pageNumber), png);
    },

    putTitle(title) {
      return put(DOCUMENT_FILES.title, `${title ?? ""}\n`);
    },

    putAuthors(authors) {
      return put(DOCUMENT_FILES.authors, authors.map((a) => `${a}\n`).join(""));
    },

    putSection(index, name, text) {
      return put(`sections/${sectionFileName(index, name)}`, `${text}\n`);
    },

    putTextManifest(manifest) {
      return put(DOCUMENT_FILES.textManifest, toJson(manifest));
    },

    putCrop(type, pageNumber, sequence, png) {
      return put(cropFileName(type, pageNumber, sequence), png);
    },

    async putManifest(manifest) {
      await put(DOCUMENT_FILES.manifest, toJson(manifest));
      return `${documentId}/${DOCUMENT_FILES.manifest}`;
    },
  };
}

async function writeFile(file: string, data: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, data);
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + "\n";
}
