/**
 * Document Parsing
 *
 * PDF → ParseReport. Pipeline:
 *   1. Extract page texts (one session per document)
 *   2. Join pages in order, segment into blocks, parse each block
 *   3. Link exhibit images
 *   4. Detect series, assign sequence numbers, classify
 *   5. Validate and count issues
 *
 * A document that cannot be read yields a failed report instead of an
 * exception, so a batch keeps going. Only a missing backend is fatal, and
 * that is raised before any document is opened.
 */

import { readFile, stat } from "fs/promises";
import { basename } from "path";
import { config } from "@/lib/config";
import type { ExtractionAdapter, ExtractionSession } from "@/lib/extraction/adapter";
import { errorMessage, logIngest } from "@/lib/logger";
import type { ExhibitStore } from "@/lib/storage/adapter";
import { detectSeries } from "./detect-series";
import type { DomainClassifier } from "./domain-classifier";
import { DocumentExtractionError } from "./errors";
import { parseBlock } from "./extract-fields";
import { linkExhibits } from "./link-exhibits";
import { segmentBlocks } from "./segment-blocks";
import { addPageIssue, createParseReport, type ParseReport, type ParsedQuestion } from "./types";
import { validateQuestions } from "./validate-report";

export interface IngestionContext {
  adapter: ExtractionAdapter;
  classifier: DomainClassifier;
  exhibitStore: ExhibitStore;
  /** Defaults to config.exhibits.urlPrefix */
  exhibitUrlPrefix?: string;
  /** Defaults to config.extraction.maxPdfSizeMB */
  maxPdfSizeMB?: number;
}

export interface ExtractedQuestions {
  questions: ParsedQuestion[];
  warnings: string[];
}

/**
 * Parse every block of the concatenated document text. A block that throws
 * is skipped and reported as a warning.
 */
export function extractQuestions(fullText: string): ExtractedQuestions {
  const { strategy, blocks } = segmentBlocks(fullText);
  const questions: ParsedQuestion[] = [];
  const warnings: string[] = [];

  blocks.forEach((block, index) => {
    try {
      const question = parseBlock(block);
      if (question) questions.push(question);
    } catch (error) {
      const warning = `Skipped block ${index + 1}: ${errorMessage(error)}`;
      warnings.push(warning);
      logIngest("parse.block", { level: "warn", message: warning });
    }
  });

  logIngest("parse.segmented", {
    message: `${blocks.length} blocks, ${questions.length} questions`,
    strategy,
  });
  return { questions, warnings };
}

/** Page texts joined in page order */
export function joinPages(pages: Map<number, string>): string {
  return [...pages.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, text]) => text)
    .join("\n");
}

async function readDocument(filePath: string, maxPdfSizeMB: number): Promise<Uint8Array> {
  const filename = basename(filePath);
  try {
    const { size } = await stat(filePath);
    const sizeMB = size / (1024 * 1024);
    if (sizeMB > maxPdfSizeMB) {
      throw new DocumentExtractionError(
        filename,
        `File is ${sizeMB.toFixed(1)}MB, above the ${maxPdfSizeMB}MB limit`,
      );
    }
    return new Uint8Array(await readFile(filePath));
  } catch (error) {
    if (error instanceof DocumentExtractionError) throw error;
    throw new DocumentExtractionError(filename, errorMessage(error), { cause: error });
  }
}

async function openSession(adapter: ExtractionAdapter, filename: string, data: Uint8Array) {
  try {
    const session = await adapter.open(data);
    const pages = await session.extractPages().catch(async (error: unknown) => {
      await session.close();
      throw error;
    });
    return { session, pages };
  } catch (error) {
    throw new DocumentExtractionError(filename, errorMessage(error), { cause: error });
  }
}

/** Mark a document as abandoned; the reason goes under page 0 */
export function markFailed(report: ParseReport, reason: string): ParseReport {
  report.failed = true;
  addPageIssue(report, 0, `Failed to read PDF: ${reason}`);
  logIngest("parse.failed", { level: "error", message: reason, filename: report.filename });
  return report;
}

/**
 * Parse one PDF into a report.
 */
export async function parseDocument(filePath: string, ctx: IngestionContext): Promise<ParseReport> {
  const start = Date.now();
  const filename = basename(filePath);
  const report = createParseReport(filename, ctx.adapter.name);

  let session: ExtractionSession;
  let pages: Map<number, string>;
  try {
    const data = await readDocument(filePath, ctx.maxPdfSizeMB ?? config.extraction.maxPdfSizeMB);
    ({ session, pages } = await openSession(ctx.adapter, filename, data));
  } catch (error) {
    if (error instanceof DocumentExtractionError) return markFailed(report, error.message);
    throw error;
  }

  try {
    const { questions, warnings } = extractQuestions(joinPages(pages));
    report.warnings.push(...warnings);

    await linkExhibits(questions, pages, report, {
      session,
      store: ctx.exhibitStore,
      urlPrefix: ctx.exhibitUrlPrefix ?? config.exhibits.urlPrefix,
    });

    detectSeries(questions);

    questions.forEach((question, index) => {
      question.sequenceNumber = index + 1;
      question.domainId = ctx.classifier.classify(question.text);
    });

    validateQuestions(questions, report);
  } finally {
    await session.close();
  }

  logIngest("parse.document", {
    message: `Parsed ${filename}`,
    durationMs: Date.now() - start,
    backend: report.backend,
    totalQuestions: report.totalQuestions,
    validQuestions: report.validQuestions,
  });
  return report;
}
