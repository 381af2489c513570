import type { Document } from "@docquery/types";
import type { IParser } from "./parser.interface.js";

/**
 * PDF parser using Mozilla's pdfjs-dist. Emits one Document per page so chunk
 * provenance keeps the page number. pdfjs is imported on first use.
 */
export class PdfParser implements IParser {
  readonly format = "pdf";
  readonly extensions = ["pdf"];

  async parse(input: Uint8Array | string, sourceId: string): Promise<Document[]> {
    const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

    // pdfjs rejects Node Buffers, copy into a plain Uint8Array
    const data = typeof input === "string" ? new TextEncoder().encode(input) : new Uint8Array(input);
    const pdf = await getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise;

    try {
      const documents: Document[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        const text = content.items
          .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : "") : ""))
          .join("")
          .trim();

        documents.push({
          sourceId,
          text,
          pageNumber,
          metadata: { format: "pdf", pageCount: pdf.numPages },
        });
      }
      return documents;
    } finally {
      await pdf.destroy();
    }
  }
}
