/**
 * Ingestion data model
 *
 * ParsedQuestion is a transient record produced by the pipeline and handed,
 * inside a ParseReport, to whoever imports it. Nothing here is persisted.
 */

import { createHash } from "crypto";

// ------------------------------------------------------------------
// Questions
// ------------------------------------------------------------------

export const CHOICE_LABELS = ["A", "B", "C", "D", "E", "F"] as const;
export type ChoiceLabel = (typeof CHOICE_LABELS)[number];

export type QuestionType = "single" | "multi" | "truefalse" | "study";

export interface Choice {
  label: ChoiceLabel;
  text: string;
}

export interface ParsedQuestion {
  /** Normalized body, paragraphs separated by a blank line */
  text: string;
  choices: Choice[];
  /** Labels of the correct choices; empty for study questions */
  correctAnswers: ChoiceLabel[];
  explanation: string | null;
  questionType: QuestionType;
  domainId: string | null;
  /** Question number as printed in the document (0 when none) */
  sourcePage: number;
  /** Reference path of the linked exhibit image */
  exhibitImage: string | null;
  seriesId: string | null;
  /** 1-based position in extraction order */
  sequenceNumber: number;
  issues: string[];
}

export function isChoiceLabel(value: string): value is ChoiceLabel {
  return CHOICE_LABELS.some((label) => label === value);
}

export function createParsedQuestion(
  fields: Pick<ParsedQuestion, "text"> & Partial<ParsedQuestion>,
): ParsedQuestion {
  return {
    choices: [],
    correctAnswers: [],
    explanation: null,
    questionType: "single",
    domainId: null,
    sourcePage: 0,
    exhibitImage: null,
    seriesId: null,
    sequenceNumber: 0,
    issues: [],
    ...fields,
  };
}

/**
 * Content-derived id: identical text and choice texts always give the same id,
 * across runs and across documents.
 */
export function stableId(question: Pick<ParsedQuestion, "text" | "choices">): string {
  const content = `${question.text}|${question.choices.map((c) => c.text).join("|")}`;
  return createHash("sha256").update(content).digest("hex").slice(0, 16);
}

export function isValid(question: ParsedQuestion): boolean {
  if (question.questionType === "study") {
    return Boolean(question.text && question.explanation);
  }
  return Boolean(question.text && question.choices.length > 0 && question.correctAnswers.length > 0);
}

// ------------------------------------------------------------------
// Reports
// ------------------------------------------------------------------

export interface ParseReport {
  filename: string;
  /** Extraction backend that supplied the text, null when none was reached */
  backend: string | null;
  /** True when text extraction failed and the document was abandoned */
  failed: boolean;
  totalQuestions: number;
  validQuestions: number;
  missingAnswers: number;
  brokenChoices: number;
  duplicates: number;
  /** Issues keyed by question number; 0 holds document-level failures */
  pageIssues: Record<number, string[]>;
  questions: ParsedQuestion[];
  /** Recoverable failures (skipped blocks, exhibit write errors) */
  warnings: string[];
}

export type ParseReportSummary = Omit<ParseReport, "questions">;

export function createParseReport(filename: string, backend: string | null = null): ParseReport {
  return {
    filename,
    backend,
    failed: false,
    totalQuestions: 0,
    validQuestions: 0,
    missingAnswers: 0,
    brokenChoices: 0,
    duplicates: 0,
    pageIssues: {},
    questions: [],
    warnings: [],
  };
}

export function addPageIssue(report: ParseReport, page: number, issue: string): void {
  const issues = report.pageIssues[page] ?? [];
  issues.push(issue);
  report.pageIssues[page] = issues;
}

/** Counter-only view of a report (what the import collaborator keeps) */
export function toReportSummary(report: ParseReport): ParseReportSummary {
  const { questions: _questions, ...summary } = report;
  return summary;
}
