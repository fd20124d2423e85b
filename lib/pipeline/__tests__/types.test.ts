import { describe, it, expect } from "vitest";
import path from "node:path";
import { pageImageFileName, resolveDocumentDir } from "../types";

describe("resolveDocumentDir", () => {
  it("resolves the document directory under the output root", () => {
    expect(resolveDocumentDir("paper", "out")).toBe(path.resolve("out", "paper"));
  });

  it("defaults outputRoot to 'output'", () => {
    expect(resolveDocumentDir("test")).toBe(path.resolve("output", "test"));
  });
});

describe("pageImageFileName", () => {
  it("zero-pads the page number to three digits", () => {
    expect(pageImageFileName(1)).toBe("pages/page_001.png");
    expect(pageImageFileName(1234)).toBe("pages/page_1234.png");
  });
});
