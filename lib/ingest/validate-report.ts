/**
 * Question validation and report counters
 *
 * Quality problems never drop a question: they become issue strings on the
 * question and counters on the report, and a reviewer decides.
 */

import { addPageIssue, isValid, stableId, type Choice, type ParseReport, type ParsedQuestion } from "./types";

const MIN_CHOICE_LENGTH = 10;

/** A choice ending like this was probably cut off mid-sentence */
const TRUNCATED_ENDING = /(?:\?|(?:^|\s)(?:and then|and|the|to|as the|from))$/;

export function choiceIssues(choice: Choice): string[] {
  if (choice.text.length < MIN_CHOICE_LENGTH) {
    return [`Choice ${choice.label} is suspiciously short: '${choice.text}'`];
  }
  if (TRUNCATED_ENDING.test(choice.text)) {
    return [`Choice ${choice.label} may be truncated: ends with '${choice.text.slice(-20)}'`];
  }
  return [];
}

/** Issues of a gradable question; study questions have none */
export function questionIssues(question: ParsedQuestion): string[] {
  if (question.questionType === "study") return [];

  const issues: string[] = [];
  if (question.correctAnswers.length === 0) {
    issues.push("Missing correct answer");
  }
  if (question.choices.length < 2) {
    issues.push("Less than 2 choices");
  }
  for (const choice of question.choices) {
    issues.push(...choiceIssues(choice));
  }

  const labels = new Set(question.choices.map((c) => c.label));
  for (const answer of question.correctAnswers) {
    if (question.choices.length > 0 && !labels.has(answer)) {
      issues.push(`Correct answer ${answer} has no matching choice`);
    }
  }
  return issues;
}

/**
 * Validate questions in order and fill the report. Duplicates are judged
 * within this document only.
 */
export function validateQuestions(questions: ParsedQuestion[], report: ParseReport): ParseReport {
  const seen = new Set<string>();

  for (const question of questions) {
    report.totalQuestions++;

    const issues = questionIssues(question);
    if (question.questionType !== "study") {
      if (question.correctAnswers.length === 0) report.missingAnswers++;
      if (question.choices.length < 2) report.brokenChoices++;
    }

    const id = stableId(question);
    if (seen.has(id)) {
      report.duplicates++;
      issues.push("Duplicate question");
    } else {
      seen.add(id);
    }

    if (isValid(question)) {
      report.validQuestions++;
    }

    for (const issue of issues) {
      question.issues.push(issue);
      addPageIssue(report, question.sourcePage, issue);
    }
    report.questions.push(question);
  }

  return report;
}
