import { describe, it, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { renderPdf, renderPdfFile } from "../render";
import { decodePng } from "../../images/png-utils";
import { createTestPdf } from "./create-test-pdf";

describe("renderPdf", () => {
  it("renders every page at the requested resolution", async () => {
    const pdfBuffer = createTestPdf([
      { width: 72, height: 144 },
      { width: 100, height: 50 },
    ]);

    const pages = await renderPdf({ pdfBuffer, dpi: 144 });

    expect(pages.map((p) => [p.pageNumber, p.width, p.height])).toEqual([
      [1, 144, 288],
      [2, 200, 100],
    ]);
  });

  it("reports the page size of the encoded raster", async () => {
    const pdfBuffer = createTestPdf([{ width: 60, height: 40, fill: [1, 0, 0] }]);

    const [page] = await renderPdf({ pdfBuffer, dpi: 72 });
    const decoded = decodePng(page.pngBuffer);

    expect([decoded.width, decoded.height]).toEqual([page.width, page.height]);
    const center = (20 * decoded.width + 30) * 4;
    expect([...decoded.data.subarray(center, center + 4)]).toEqual([255, 0, 0, 255]);
  });

  it("reports progress per page", async () => {
    const pdfBuffer = createTestPdf([
      { width: 10, height: 10 },
      { width: 10, height: 10 },
    ]);
    const seen: string[] = [];

    await renderPdf({ pdfBuffer, dpi: 72 }, (p) => seen.push(`${p.page}/${p.totalPages}`));

    expect(seen).toEqual(["1/2", "2/2"]);
  });

  it("rejects a non-positive DPI", async () => {
    const pdfBuffer = createTestPdf([{ width: 10, height: 10 }]);
    await expect(renderPdf({ pdfBuffer, dpi: 0 })).rejects.toThrow("Invalid DPI: 0");
  });

  it("rejects bytes that are not a PDF", async () => {
    await expect(
      renderPdf({ pdfBuffer: Buffer.from("not a pdf"), dpi: 72 })
    ).rejects.toThrow();
  });
});

describe("renderPdfFile", () => {
  it("reads the PDF from disk", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "render-test-"));
    const file = path.join(tmpDir, "one.pdf");
    fs.writeFileSync(file, createTestPdf([{ width: 36, height: 36 }]));

    const pages = await renderPdfFile(file, 144);

    expect(pages).toHaveLength(1);
    expect([pages[0].width, pages[0].height]).toEqual([72, 72]);
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("passes page progress through", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "render-test-"));
    const file = path.join(tmpDir, "two.pdf");
    fs.writeFileSync(
      file,
      createTestPdf([
        { width: 36, height: 36 },
        { width: 36, height: 36 },
      ])
    );
    const seen: string[] = [];

    await renderPdfFile(file, 72, (p) => seen.push(`${p.page}/${p.totalPages}`));

    expect(seen).toEqual(["1/2", "2/2"]);
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });
});
