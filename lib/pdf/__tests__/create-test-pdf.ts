/**
 * Builds small PDFs with mupdf so render tests don't depend on external files.
 */
import * as mupdf from "mupdf";

export interface TestPage {
  /** Page size in PDF points */
  width: number;
  height: number;
  /** Fill color of the whole page, 0-1 per channel */
  fill?: [number, number, number];
}

export function createTestPdf(pages: TestPage[]): Buffer {
  const doc = new mupdf.PDFDocument();
  for (const page of pages) {
    const [r, g, b] = page.fill ?? [1, 1, 1];
    const buf = new mupdf.Buffer();
    buf.writeLine(`q\n${r} ${g} ${b} rg\n0 0 ${page.width} ${page.height} re f\nQ`);
    const resources = doc.addObject(doc.newDictionary());
    doc.insertPage(
      -1,
      doc.addPage([0, 0, page.width, page.height], 0, resources, buf)
    );
  }
  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}
