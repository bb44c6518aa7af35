/**
 * Scan Session
 *
 * One scan-then-import transaction, owned by the caller:
 *
 *   const session = new ScanSession({ ingestion, ledger });
 *   const summary = await session.scanDirectory("./pdfs");   // review this
 *   const plan = session.prepareImport(edits, storedIds);    // persist plan.questions
 *   await session.completeImport();                          // mark documents imported
 *
 * Storing the planned questions is up to the caller; the session only
 * decides what to import and records which documents are done.
 */

import { readdir, readFile, stat } from "fs/promises";
import { join } from "path";
import { config } from "@/lib/config";
import { errorMessage, logIngest } from "@/lib/logger";
import { computeContentHash } from "@/lib/storage/utils";
import type { LedgerEntry, QuestionEdit } from "@/lib/validation";
import { loadDemoQuestions } from "./demo-questions";
import type { ImportLedger } from "./import-ledger";
import { markFailed, parseDocument, type IngestionContext } from "./parse-document";
import {
  createParseReport,
  isValid,
  stableId,
  toReportSummary,
  type ParseReport,
  type ParseReportSummary,
  type ParsedQuestion,
} from "./types";
import { validateQuestions } from "./validate-report";

// ------------------------------------------------------------------
// Types
// ------------------------------------------------------------------

const PREVIEW_LENGTH = 200;
export const DEMO_REPORT_NAME = "demo_questions";

export interface QuestionPreview {
  stableId: string;
  text: string;
  choicesCount: number;
  hasAnswer: boolean;
  domainId: string | null;
  issues: string[];
  sourcePage: number;
}

export interface DocumentScan extends ParseReportSummary {
  /** SHA-256 of the file; null for demo questions */
  fileHash: string | null;
  questions: QuestionPreview[];
}

export interface IssuesSummary {
  missingAnswers: number;
  brokenChoices: number;
  duplicates: number;
}

export interface ScanSummary {
  filesFound: number;
  /** Files skipped because the ledger has them as imported */
  skippedFiles: string[];
  documents: DocumentScan[];
  needsImport: boolean;
  demo: boolean;
  totalQuestions: number;
  validQuestions: number;
  issuesSummary: IssuesSummary;
}

export interface ImportPlan {
  questions: ParsedQuestion[];
  skipped: number;
  /** Imported question count per domain id */
  domainCounts: Record<string, number>;
}

export interface ScanSessionOptions {
  ingestion: IngestionContext;
  ledger: ImportLedger;
  /** Offer demo questions when the directory holds no documents */
  demoWhenEmpty?: boolean;
  demoQuestionsPath?: string;
}

interface ScannedDocument {
  report: ParseReport;
  fileHash: string | null;
}

// ------------------------------------------------------------------
// Helpers
// ------------------------------------------------------------------

export function previewQuestion(question: ParsedQuestion): QuestionPreview {
  return {
    stableId: stableId(question),
    text: question.text.length > PREVIEW_LENGTH ? `${question.text.slice(0, PREVIEW_LENGTH)}...` : question.text,
    choicesCount: question.choices.length,
    hasAnswer: question.correctAnswers.length > 0,
    domainId: question.domainId,
    issues: [...question.issues],
    sourcePage: question.sourcePage,
  };
}

/** Apply a reviewer edit to a copy of the question */
export function applyEdit(question: ParsedQuestion, edit: QuestionEdit | undefined): ParsedQuestion {
  const edited: ParsedQuestion = {
    ...question,
    choices: [...question.choices],
    correctAnswers: [...question.correctAnswers],
    issues: [...question.issues],
  };
  if (!edit) return edited;

  if (edit.text) edited.text = edit.text;
  if (edit.choices && edit.choices.length > 0) edited.choices = edit.choices.map((c) => ({ ...c }));
  if (edit.correctAnswers && edit.correctAnswers.length > 0) edited.correctAnswers = [...edit.correctAnswers];
  if (edit.domainId) edited.domainId = edit.domainId;
  return edited;
}

/** SHA-256 of the file, null when it is over the size limit (parsing reports that) */
async function hashDocument(filePath: string, maxPdfSizeMB: number): Promise<string | null> {
  const { size } = await stat(filePath);
  if (size / (1024 * 1024) > maxPdfSizeMB) return null;
  return computeContentHash(await readFile(filePath));
}

async function listDocuments(dir: string): Promise<string[]> {
  try {
    const names = await readdir(dir);
    return names.filter((name) => name.toLowerCase().endsWith(".pdf")).sort();
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }
}

// ------------------------------------------------------------------
// Session
// ------------------------------------------------------------------

export class ScanSession {
  private scanned: ScannedDocument[] | null = null;
  private demo = false;

  constructor(private readonly options: ScanSessionOptions) {}

  get hasScan(): boolean {
    return this.scanned !== null;
  }

  get isDemo(): boolean {
    return this.demo;
  }

  /** Every question of the current scan, in document order */
  get questions(): ParsedQuestion[] {
    return (this.scanned ?? []).flatMap((doc) => doc.report.questions);
  }

  async scanDirectory(dir: string): Promise<ScanSummary> {
    const start = Date.now();
    const files = await listDocuments(dir);

    if (files.length === 0) {
      return this.options.demoWhenEmpty ? this.scanDemo() : this.finish([], [], 0, false);
    }

    const scanned: ScannedDocument[] = [];
    const skippedFiles: string[] = [];

    const { ingestion } = this.options;
    const maxPdfSizeMB = ingestion.maxPdfSizeMB ?? config.extraction.maxPdfSizeMB;

    for (const file of files) {
      const filePath = join(dir, file);

      let fileHash: string | null;
      try {
        fileHash = await hashDocument(filePath, maxPdfSizeMB);
      } catch (error) {
        const report = markFailed(createParseReport(file, ingestion.adapter.name), errorMessage(error));
        scanned.push({ report, fileHash: null });
        continue;
      }

      if (fileHash && (await this.options.ledger.isCompleted(file, fileHash))) {
        skippedFiles.push(file);
        continue;
      }

      const report = await parseDocument(filePath, ingestion);
      scanned.push({ report, fileHash });
    }

    logIngest("scan.directory", {
      message: `Scanned ${files.length} files, ${scanned.length} parsed`,
      durationMs: Date.now() - start,
      dir,
      skipped: skippedFiles.length,
    });
    return this.finish(scanned, skippedFiles, files.length, false);
  }

  private async scanDemo(): Promise<ScanSummary> {
    const report = createParseReport(DEMO_REPORT_NAME);
    validateQuestions(await loadDemoQuestions(this.options.demoQuestionsPath), report);
    logIngest("scan.demo", { message: `No documents found, offering ${report.totalQuestions} demo questions` });
    return this.finish([{ report, fileHash: null }], [], 0, true);
  }

  private finish(scanned: ScannedDocument[], skippedFiles: string[], filesFound: number, demo: boolean): ScanSummary {
    this.scanned = scanned;
    this.demo = demo;

    const documents = scanned.map(({ report, fileHash }) => ({
      ...toReportSummary(report),
      fileHash,
      questions: report.questions.map(previewQuestion),
    }));

    const sum = (pick: (doc: DocumentScan) => number) => documents.reduce((total, doc) => total + pick(doc), 0);

    return {
      filesFound,
      skippedFiles,
      documents,
      needsImport: documents.length > 0,
      demo,
      totalQuestions: sum((d) => d.totalQuestions),
      validQuestions: sum((d) => d.validQuestions),
      issuesSummary: {
        missingAnswers: sum((d) => d.missingAnswers),
        brokenChoices: sum((d) => d.brokenChoices),
        duplicates: sum((d) => d.duplicates),
      },
    };
  }

  /**
   * Decide what to import. Edits are keyed by the stable id shown in the
   * scan summary; skipped, invalid, repeated and already stored questions
   * are left out.
   */
  prepareImport(
    edits: Record<string, QuestionEdit> = {},
    knownStableIds: ReadonlySet<string> = new Set(),
  ): ImportPlan {
    if (!this.scanned) {
      throw new Error("No scan results. Run scanDirectory first.");
    }

    const plan: ImportPlan = { questions: [], skipped: 0, domainCounts: {} };
    const seen = new Set<string>();

    for (const original of this.questions) {
      const edit = edits[stableId(original)];
      if (edit?.skip) {
        plan.skipped++;
        continue;
      }

      const question = applyEdit(original, edit);
      const id = stableId(question);
      if (!isValid(question) || seen.has(id) || knownStableIds.has(id)) {
        plan.skipped++;
        continue;
      }
      seen.add(id);

      plan.questions.push(question);
      if (question.domainId) {
        plan.domainCounts[question.domainId] = (plan.domainCounts[question.domainId] ?? 0) + 1;
      }
    }

    logIngest("import.prepared", {
      message: `${plan.questions.length} to import, ${plan.skipped} skipped`,
      domainCounts: plan.domainCounts,
    });
    return plan;
  }

  /**
   * Record every parsed document as imported and close the session.
   * Demo scans record nothing.
   */
  async completeImport(): Promise<LedgerEntry[]> {
    if (!this.scanned) {
      throw new Error("No scan results. Run scanDirectory first.");
    }

    const recorded: LedgerEntry[] = [];
    if (!this.demo) {
      for (const { report, fileHash } of this.scanned) {
        if (!fileHash || report.failed) continue;
        try {
          recorded.push(
            await this.options.ledger.record({
              filename: report.filename,
              fileHash,
              status: "completed",
              questionsImported: report.validQuestions,
            }),
          );
        } catch (error) {
          logIngest("import.ledger", {
            level: "error",
            message: `Could not record ${report.filename}: ${errorMessage(error)}`,
          });
          throw error;
        }
      }
    }

    this.scanned = null;
    this.demo = false;
    return recorded;
  }
}
