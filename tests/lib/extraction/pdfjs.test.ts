/**
 * Tests for the pdfjs-dist backend
 *
 * Verifies:
 * - Text items are regrouped into lines and words
 * - One text entry per page; document destroyed on close
 */
import { describe, it, expect, vi } from "vitest";

const pdfjs = vi.hoisted(() => {
  const destroy = vi.fn(async () => {});
  const pageItems: Record<number, unknown[]> = {
    1: [
      { str: "Q1", transform: [1, 0, 0, 1, 10, 700], width: 12 },
      { str: "Which", transform: [1, 0, 0, 1, 10, 680], width: 30 },
      { str: "zone?", transform: [1, 0, 0, 1, 45, 681], width: 30 },
    ],
    2: [{ str: "Answer: A", transform: [1, 0, 0, 1, 10, 700], width: 50 }],
  };
  const document = {
    numPages: 2,
    getPage: async (pageNumber: number) => ({
      getTextContent: async () => ({ items: pageItems[pageNumber] ?? [] }),
    }),
    destroy,
  };
  return { destroy, getDocument: vi.fn(() => ({ promise: Promise.resolve(document) })) };
});

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({ getDocument: pdfjs.getDocument }));

import { PdfjsAdapter, renderPageText } from "@/lib/extraction/pdfjs";

const item = (str: string, x: number, y: number, width: number) => ({
  str,
  transform: [1, 0, 0, 1, x, y],
  width,
});

describe("renderPageText", () => {
  it("orders lines top to bottom and words left to right", () => {
    const text = renderPageText([
      item("world", 40, 700, 25),
      item("Hello", 10, 701, 25),
      item("Next", 10, 680, 20),
    ]);

    expect(text).toBe("Hello world\nNext");
  });

  it("joins items that touch without a space", () => {
    expect(renderPageText([item("Az", 10, 500, 10), item("ure", 20, 500, 15)])).toBe("Azure");
  });

  it("ignores items that are not text", () => {
    const items = ["junk", null, item("", 0, 0, 0), { str: "no transform" }, item("Kept", 0, 0, 10)];

    expect(renderPageText(items)).toBe("Kept");
  });
});

describe("PdfjsAdapter", () => {
  it("extracts every page and has no images", async () => {
    const session = await new PdfjsAdapter().open(new Uint8Array([1, 2, 3]));

    const pages = await session.extractPages();

    expect([...pages.entries()]).toEqual([
      [1, "Q1\nWhich zone?"],
      [2, "Answer: A"],
    ]);
    expect(await session.images(1)).toEqual([]);
    expect(pdfjs.getDocument).toHaveBeenCalledWith({ data: new Uint8Array([1, 2, 3]), isEvalSupported: false });
  });

  it("destroys the document on close", async () => {
    const session = await new PdfjsAdapter().open(new Uint8Array([1]));

    await session.close();

    expect(pdfjs.destroy).toHaveBeenCalled();
  });

  it("reports itself available when the module loads", async () => {
    expect(await new PdfjsAdapter().isAvailable()).toBe(true);
  });
});
