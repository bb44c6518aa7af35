/**
 * Tests for parse-document.ts
 *
 * Verifies:
 * - Full pipeline over a fake extraction backend
 * - Failed reports for unreadable, oversized and missing documents
 * - Session is closed on every path
 * - A block that throws is skipped with a warning
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

vi.mock("@/lib/ingest/extract-fields", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/ingest/extract-fields")>();
  return { ...actual, parseBlock: vi.fn(actual.parseBlock) };
});

import type { ExtractionAdapter, ExtractionSession } from "@/lib/extraction/adapter";
import { DomainClassifier } from "@/lib/ingest/domain-classifier";
import { parseBlock } from "@/lib/ingest/extract-fields";
import { extractQuestions, joinPages, parseDocument, type IngestionContext } from "@/lib/ingest/parse-document";
import type { ExhibitStore } from "@/lib/storage/adapter";

const page1 = [
  "Q1",
  "You have an Azure Monitor workspace.",
  "What should you configure first?",
  "A. An alert rule for the workspace",
  "B. A diagnostic setting on the resource",
  "Answer: A",
  "Explanation:",
  "Alert rules evaluate signals collected in the workspace.",
].join("\n");

const page2 = [
  "Q2",
  "You need to store blob data cheaply.",
  "What should you use?",
  "A. The archive access tier",
  "B. The premium access tier",
  "Answer: B",
].join("\n");

const classifier = new DomainClassifier({
  domains: [
    { id: "identity-governance", name: "Identity", keywords: ["role"] },
    { id: "monitoring", name: "Monitoring", keywords: ["azure monitor"] },
    { id: "storage", name: "Storage", keywords: ["blob", "archive"] },
  ],
  default_domain: "identity-governance",
});

const store: ExhibitStore = {
  save: vi.fn(async (_bytes: Uint8Array, fileName: string) => ({ fileName, contentHash: "h", written: true })),
  exists: vi.fn(async () => false),
};

function makeSession(pages: Map<number, string>): ExtractionSession {
  return {
    extractPages: vi.fn(async () => pages),
    images: vi.fn(async () => []),
    close: vi.fn(async () => {}),
  };
}

function makeAdapter(open: ExtractionAdapter["open"]): ExtractionAdapter {
  return { name: "pdf-parse", isAvailable: async () => true, open: vi.fn(open) };
}

describe("parseDocument", () => {
  let dir: string;
  let pdfPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), "parse-"));
    pdfPath = join(dir, "exam.pdf");
    await writeFile(pdfPath, "%PDF-placeholder");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function context(adapter: ExtractionAdapter, overrides: Partial<IngestionContext> = {}): IngestionContext {
    return { adapter, classifier, exhibitStore: store, ...overrides };
  }

  it("parses, numbers and classifies every question", async () => {
    const session = makeSession(new Map([[2, page2], [1, page1]]));
    const adapter = makeAdapter(async () => session);

    const report = await parseDocument(pdfPath, context(adapter));

    expect(report.filename).toBe("exam.pdf");
    expect(report.backend).toBe("pdf-parse");
    expect(report.failed).toBe(false);
    expect(report.totalQuestions).toBe(2);
    expect(report.validQuestions).toBe(2);
    expect(report.missingAnswers).toBe(0);
    expect(report.pageIssues).toEqual({});

    const [q1, q2] = report.questions;
    expect(q1.text).toBe("You have an Azure Monitor workspace.\n\nWhat should you configure first?");
    expect(q1.correctAnswers).toEqual(["A"]);
    expect(q1.explanation).toBe("Alert rules evaluate signals collected in the workspace.");
    expect(q1.domainId).toBe("monitoring");
    expect(q1.sequenceNumber).toBe(1);
    expect(q2.correctAnswers).toEqual(["B"]);
    expect(q2.domainId).toBe("storage");
    expect(q2.sequenceNumber).toBe(2);

    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it("returns a failed report when the backend cannot open the file", async () => {
    const adapter = makeAdapter(async () => {
      throw new Error("bad xref");
    });

    const report = await parseDocument(pdfPath, context(adapter));

    expect(report.failed).toBe(true);
    expect(report.pageIssues[0]).toEqual(["Failed to read PDF: bad xref"]);
    expect(report.totalQuestions).toBe(0);
  });

  it("closes the session when text extraction fails", async () => {
    const session = makeSession(new Map());
    vi.mocked(session.extractPages).mockRejectedValueOnce(new Error("corrupt page tree"));

    const report = await parseDocument(pdfPath, context(makeAdapter(async () => session)));

    expect(report.failed).toBe(true);
    expect(report.pageIssues[0]).toEqual(["Failed to read PDF: corrupt page tree"]);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it("refuses files above the size limit without opening them", async () => {
    const adapter = makeAdapter(async () => makeSession(new Map()));

    const report = await parseDocument(pdfPath, context(adapter, { maxPdfSizeMB: 0 }));

    expect(report.failed).toBe(true);
    expect(report.pageIssues[0][0]).toMatch(/above the 0MB limit$/);
    expect(adapter.open).not.toHaveBeenCalled();
  });

  it("reports a missing file as failed", async () => {
    const adapter = makeAdapter(async () => makeSession(new Map()));

    const report = await parseDocument(join(dir, "missing.pdf"), context(adapter));

    expect(report.failed).toBe(true);
    expect(report.filename).toBe("missing.pdf");
    expect(report.pageIssues[0][0]).toMatch(/^Failed to read PDF: /);
  });
});

describe("extractQuestions", () => {
  it("skips a block that throws and keeps going", () => {
    vi.mocked(parseBlock).mockImplementationOnce(() => {
      throw new Error("boom");
    });

    const { questions, warnings } = extractQuestions("Q1\nFirst question?\nQ2\nSecond question?");

    expect(questions.map((q) => q.text)).toEqual(["Second question?"]);
    expect(warnings).toEqual(["Skipped block 1: boom"]);
  });
});

describe("extractQuestions on the same text twice", () => {
  it("yields equal question lists", () => {
    const text = `${page1}\n${page2}`;

    const first = extractQuestions(text);
    const second = extractQuestions(text);

    expect(second).toEqual(first);
    expect(first.questions).toHaveLength(2);
    expect(first.questions[0]).not.toBe(second.questions[0]);
  });
});

describe("joinPages", () => {
  it("joins pages in page order", () => {
    expect(joinPages(new Map([[2, "two"], [1, "one"]]))).toBe("one\ntwo");
  });
});
