/**
 * pdfjs-dist Extraction Adapter
 *
 * Fallback backend. Text only: positioned text items are regrouped into
 * lines, which tolerates PDFs whose text runs come out of order.
 */

import type { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractionAdapter, ExtractionSession, PageImage } from "./adapter";

/** Items whose baselines differ by at most this much share a line */
export const LINE_Y_TOLERANCE = 3;
/** Horizontal gap above which adjacent items are separated by a space */
export const WORD_GAP = 3;

interface TextPiece {
  text: string;
  x: number;
  y: number;
  width: number;
}

const toTextPiece = (item: unknown): TextPiece | null => {
  if (typeof item !== "object" || item === null) return null;
  if (!("str" in item) || typeof item.str !== "string") return null;
  if (!("transform" in item) || !Array.isArray(item.transform)) return null;

  const [, , , , x, y] = item.transform;
  if (typeof x !== "number" || typeof y !== "number") return null;

  const width = "width" in item && typeof item.width === "number" ? item.width : 0;
  return { text: item.str, x, y, width };
};

/** Rebuild page text from positioned items, top to bottom, left to right */
export function renderPageText(items: unknown[]): string {
  const pieces = items
    .map(toTextPiece)
    .filter((piece): piece is TextPiece => piece !== null && piece.text.length > 0);

  // PDF y grows upwards
  pieces.sort((a, b) => b.y - a.y || a.x - b.x);

  const lines: TextPiece[][] = [];
  for (const piece of pieces) {
    const current = lines[lines.length - 1];
    if (current && Math.abs(current[0].y - piece.y) <= LINE_Y_TOLERANCE) {
      current.push(piece);
    } else {
      lines.push([piece]);
    }
  }

  return lines
    .map((line) => {
      const sorted = [...line].sort((a, b) => a.x - b.x);
      let output = "";
      let previous: TextPiece | null = null;
      for (const piece of sorted) {
        if (previous && piece.x - (previous.x + previous.width) > WORD_GAP) {
          output += " ";
        }
        output += piece.text;
        previous = piece;
      }
      return output;
    })
    .join("\n");
}

type PdfDocument = Awaited<ReturnType<typeof getDocument>["promise"]>;

class PdfjsSession implements ExtractionSession {
  constructor(private readonly document: PdfDocument) {}

  async extractPages(): Promise<Map<number, string>> {
    const pages = new Map<number, string>();
    for (let pageNumber = 1; pageNumber <= this.document.numPages; pageNumber += 1) {
      const page = await this.document.getPage(pageNumber);
      const content = await page.getTextContent();
      const items: unknown[] = content.items;
      pages.set(pageNumber, renderPageText(items));
    }
    return pages;
  }

  async images(): Promise<PageImage[]> {
    return [];
  }

  async close(): Promise<void> {
    await this.document.destroy();
  }
}

export class PdfjsAdapter implements ExtractionAdapter {
  readonly name = "pdfjs" as const;

  async isAvailable(): Promise<boolean> {
    try {
      await import("pdfjs-dist/legacy/build/pdf.mjs");
      return true;
    } catch {
      return false;
    }
  }

  async open(data: Uint8Array): Promise<ExtractionSession> {
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
    const document = await pdfjs.getDocument({ data, isEvalSupported: false }).promise;
    return new PdfjsSession(document);
  }
}
