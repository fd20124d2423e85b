import path from "node:path";

const MAX_SLUG_LENGTH = 80;

export function slugify(text: string): string {
  const slug = text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/g, "");
  return slug || "section";
}

/** "03_methods.txt" for the third section named "Methods". */
export function sectionFileName(index: number, name: string): string {
  return `${String(index).padStart(2, "0")}_${slugify(name)}.txt`;
}

/** Document identifier: the PDF's file name without extension. */
export function documentIdFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Document ids for a run, in input order. Ids that would share a directory
 * on a case-insensitive filesystem get a suffix: x, x_2, X_3.
 */
export function uniqueDocumentIds(filePaths: string[]): string[] {
  const taken = new Set<string>();
  return filePaths.map((filePath) => {
    const base = documentIdFromPath(filePath);
    let id = base;
    for (let n = 2; taken.has(id.toLowerCase()); n++) {
      id = `${base}_${n}`;
    }
    taken.add(id.toLowerCase());
    return id;
  });
}
