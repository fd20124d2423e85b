import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { createFileStorage } from "../storage-adapter";
import { makePng } from "../../../images/__tests__/png-fixtures";

describe("createFileStorage", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "storage-adapter-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function read(...segments: string[]): string {
    return fs.readFileSync(path.join(tmpDir, ...segments), "utf-8");
  }

  it("places each document under its own directory", () => {
    const storage = createFileStorage(tmpDir);
    const doc = storage.forDocument("paper");

    expect(storage.outputRoot).toBe(path.resolve(tmpDir));
    expect(doc.documentId).toBe("paper");
    expect(doc.outputDir).toBe(path.join(path.resolve(tmpDir), "paper"));
  });

  it("writes title and authors one value per line", async () => {
    const doc = createFileStorage(tmpDir).forDocument("paper");

    expect(await doc.putTitle("Deep Sea Vents")).toBe("title.txt");
    expect(await doc.putAuthors(["Ada Park", "Bo Chen"])).toBe("authors.txt");

    expect(read("paper", "title.txt")).toBe("Deep Sea Vents\n");
    expect(read("paper", "authors.txt")).toBe("Ada Park\nBo Chen\n");
  });

  it("writes an empty title and author file when nothing was found", async () => {
    const doc = createFileStorage(tmpDir).forDocument("paper");

    await doc.putTitle(null);
    await doc.putAuthors([]);

    expect(read("paper", "title.txt")).toBe("\n");
    expect(read("paper", "authors.txt")).toBe("");
  });

  it("names section files by position and slug", async () => {
    const doc = createFileStorage(tmpDir).forDocument("paper");

    const file = await doc.putSection(3, "Results & Discussion", "Body text.");

    expect(file).toBe("sections/03_results_discussion.txt");
    expect(read("paper", "sections", "03_results_discussion.txt")).toBe(
      "Body text.\n"
    );
  });

  it("writes page images and crops as binary files", async () => {
    const doc = createFileStorage(tmpDir).forDocument("paper");
    const png = makePng(2, 2);

    expect(await doc.putPageImage(7, png)).toBe("pages/page_007.png");
    expect(await doc.putCrop("table", 7, 2, png)).toBe(
      "tables/table_p007_02.png"
    );

    expect(
      fs.readFileSync(path.join(tmpDir, "paper", "pages", "page_007.png")).equals(png)
    ).toBe(true);
    expect(
      fs
        .readFileSync(path.join(tmpDir, "paper", "tables", "table_p007_02.png"))
        .equals(png)
    ).toBe(true);
  });

  it("writes JSON with two-space indent and a trailing newline", async () => {
    const doc = createFileStorage(tmpDir).forDocument("paper");

    const file = await doc.putTextManifest({
      title: null,
      authors: [],
      sections: [],
      batches: [],
    });

    expect(file).toBe("text_manifest.json");
    expect(read("paper", "text_manifest.json")).toBe(
      '{\n  "title": null,\n  "authors": [],\n  "sections": [],\n  "batches": []\n}\n'
    );
  });

  it("returns the document manifest path relative to the output root", async () => {
    const doc = createFileStorage(tmpDir).forDocument("paper");

    const file = await doc.putManifest({
      document_id: "paper",
      pdf: "/in/paper.pdf",
      output_dir: doc.outputDir,
      status: "render_failed",
      title: null,
      authors: [],
      title_file: null,
      authors_file: null,
      text_manifest_file: null,
      sections: [],
      pages: [],
      errors: { render: "corrupt", text_batches: [] },
    });

    expect(file).toBe("paper/manifest.json");
    expect(JSON.parse(read("paper", "manifest.json")).status).toBe(
      "render_failed"
    );
  });

  it("writes the run manifest at the output root", async () => {
    const storage = createFileStorage(tmpDir);

    const file = await storage.putRunManifest({
      started_at: "2026-01-01T00:00:00.000Z",
      finished_at: "2026-01-01T00:00:01.000Z",
      documents: [],
      totals: {
        documents: 0,
        complete: 0,
        partial: 0,
        failed: 0,
        pages: 0,
        sections: 0,
        figures: 0,
        tables: 0,
      },
    });

    expect(file).toBe(path.join(path.resolve(tmpDir), "run_manifest.json"));
    expect(JSON.parse(read("run_manifest.json")).documents).toEqual([]);
  });
});
