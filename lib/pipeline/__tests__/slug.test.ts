import { describe, it, expect } from "vitest";
import {
  documentIdFromPath,
  sectionFileName,
  slugify,
  uniqueDocumentIds,
} from "../slug";

describe("slugify", () => {
  it("lowercases and joins words with underscores", () => {
    expect(slugify("Materials and Methods")).toBe("materials_and_methods");
  });

  it("collapses runs of punctuation", () => {
    expect(slugify("Results & Discussion")).toBe("results_discussion");
  });

  it("strips leading and trailing separators", () => {
    expect(slugify("  (Appendix A)  ")).toBe("appendix_a");
  });

  it("folds accented letters to ASCII", () => {
    expect(slugify("Résumé Über")).toBe("resume_uber");
  });

  it("falls back when nothing alphanumeric remains", () => {
    expect(slugify("§§")).toBe("section");
    expect(slugify("")).toBe("section");
  });

  it("caps the length without leaving a trailing separator", () => {
    const name = `${"a".repeat(79)} b`;
    expect(slugify(name)).toBe("a".repeat(79));
  });
});

describe("sectionFileName", () => {
  it("prefixes the zero-padded position", () => {
    expect(sectionFileName(3, "Methods")).toBe("03_methods.txt");
    expect(sectionFileName(12, "References")).toBe("12_references.txt");
  });

  it("keeps the suffix of a renamed repeat", () => {
    expect(sectionFileName(5, "Methods (2)")).toBe("05_methods_2.txt");
  });
});

describe("documentIdFromPath", () => {
  it("strips directory and extension", () => {
    expect(documentIdFromPath("/some/dir/My Paper.pdf")).toBe("My Paper");
  });

  it("keeps paths without extension", () => {
    expect(documentIdFromPath("simple")).toBe("simple");
  });

  it("drops only the last extension", () => {
    expect(documentIdFromPath("in/v1.2.final.PDF")).toBe("v1.2.final");
  });
});

describe("uniqueDocumentIds", () => {
  it("keeps distinct names as they are", () => {
    expect(uniqueDocumentIds(["/in/a.pdf", "/in/b.pdf"])).toEqual(["a", "b"]);
  });

  it("suffixes names that differ only in case or extension", () => {
    expect(uniqueDocumentIds(["/in/x.pdf", "/in/x.PDF", "/in/X.pdf"])).toEqual([
      "x",
      "x_2",
      "X_3",
    ]);
  });

  it("skips a suffix another file already uses", () => {
    expect(uniqueDocumentIds(["/in/a.pdf", "/in/a_2.pdf", "/other/a.pdf"])).toEqual([
      "a",
      "a_2",
      "a_3",
    ]);
  });
});
