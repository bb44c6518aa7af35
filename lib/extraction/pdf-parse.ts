/**
 * pdf-parse Extraction Adapter
 *
 * Primary backend: page text, native table detection and embedded images.
 * pdf-parse is loaded lazily so the pdfjs backend works without it.
 */

import type { PDFParse } from "pdf-parse";
import { errorMessage, logExtraction } from "@/lib/logger";
import type { ExtractionAdapter, ExtractionSession, PageImage } from "./adapter";
import { formatTableAsText, mergeTablesWithText } from "./tables";

class PdfParseSession implements ExtractionSession {
  private pages: Map<number, string> | null = null;

  constructor(private readonly parser: PDFParse) {}

  async extractPages(): Promise<Map<number, string>> {
    if (this.pages) return this.pages;

    const result = await this.parser.getText();
    const tablesByPage = await this.extractTables();

    const pages = new Map<number, string>();
    for (const page of result.pages) {
      const tables = tablesByPage.get(page.num) ?? [];
      pages.set(page.num, mergeTablesWithText(page.text, tables));
    }

    this.pages = pages;
    return pages;
  }

  /** Rendered tables per page; a detection failure only loses the tables */
  private async extractTables(): Promise<Map<number, string[]>> {
    const byPage = new Map<number, string[]>();
    try {
      const result = await this.parser.getTable();
      for (const page of result.pages) {
        const rendered = page.tables
          .map((table) => formatTableAsText(table))
          .filter((text): text is string => text !== null);
        if (rendered.length > 0) {
          byPage.set(page.num, rendered);
        }
      }
    } catch (error) {
      logExtraction("pdf-parse.tables", {
        level: "warn",
        message: `Table extraction failed: ${errorMessage(error)}`,
      });
    }
    return byPage;
  }

  async images(pageNumber: number): Promise<PageImage[]> {
    // Table renders are wide and short; the library's default threshold (80px) drops them
    const result = await this.parser.getImage({
      partial: [pageNumber],
      imageDataUrl: false,
      imageThreshold: 0,
    });
    const page = result.pages.find((p) => p.pageNumber === pageNumber);
    if (!page) return [];

    return page.images.map((image) => ({
      bytes: image.data,
      format: "png",
      width: image.width,
      height: image.height,
    }));
  }

  async close(): Promise<void> {
    await this.parser.destroy();
  }
}

export class PdfParseAdapter implements ExtractionAdapter {
  readonly name = "pdf-parse" as const;

  async isAvailable(): Promise<boolean> {
    try {
      await import("pdf-parse");
      return true;
    } catch {
      return false;
    }
  }

  async open(data: Uint8Array): Promise<ExtractionSession> {
    const { PDFParse } = await import("pdf-parse");
    return new PdfParseSession(new PDFParse({ data }));
  }
}
