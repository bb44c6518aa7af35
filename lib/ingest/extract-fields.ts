/**
 * Question Field Extraction
 *
 * Turns one question block into a ParsedQuestion: body text, choices,
 * correct answers, explanation and question kind. Every step is a
 * heuristic over unreliable text; nothing here throws on odd input, it
 * just extracts less.
 *
 * Study questions (drag-and-drop, hotspot) have no gradable answer in the
 * source. They keep their body and always get an explanation, falling back
 * to a reference link or a generic placeholder.
 */

import {
  CHOICE_LABELS,
  createParsedQuestion,
  isChoiceLabel,
  type Choice,
  type ChoiceLabel,
  type ParsedQuestion,
  type QuestionType,
} from "./types";
import { collapseWhitespace, fixWordSpacing, fixWordSpacingPreserveParagraphs } from "./normalize-text";
import { firstMatch, type Strategy } from "./strategies";

// ------------------------------------------------------------------
// Constants
// ------------------------------------------------------------------

export const MIN_EXPLANATION_LENGTH = 20;
export const MAX_EXPLANATION_LENGTH = 2000;

/** Study explanations shorter than this are treated as noise */
const MIN_STUDY_EXPLANATION_LENGTH = 50;

const MULTI_SELECT_CUES = [
  "select all",
  "choose all",
  "select two",
  "select three",
  "which two",
  "which three",
  "(choose two)",
  "(choose three)",
  "select the correct answers",
  "correct answers are",
];

const STUDY_PLACEHOLDERS: Record<StudyKind, string> = {
  "drag-drop":
    "DRAG & DROP: This question requires matching or ordering items. Focus on the relationships between the components described in the scenario.",
  hotspot:
    "HOTSPOT: This question requires selecting areas on a diagram. Focus on the interface and configuration options described in the scenario.",
};

/** Interactive instructions that make no sense outside the original exam UI */
const STUDY_BOILERPLATE: RegExp[] = [
  /^DRAG\s*DROP\s*/i,
  /^HOTSPOT\s*/i,
  /Select and Place[:\s]*/gi,
  /Hot Area[:\s]*/gi,
  /Answer by dragging.*?answer area\.?/gi,
  /To answer,.*?answer area\.?/gi,
  /NOTE:.*?point\.?/gi,
];

// ------------------------------------------------------------------
// Study kind
// ------------------------------------------------------------------

export type StudyKind = "drag-drop" | "hotspot";

export function detectStudyKind(block: string): StudyKind | null {
  const upper = block.toUpperCase();
  if (upper.includes("DRAGDROP") || upper.includes("DRAG DROP")) return "drag-drop";
  if (upper.includes("HOTSPOT")) return "hotspot";
  return null;
}

// ------------------------------------------------------------------
// Question number and text
// ------------------------------------------------------------------

const QUESTION_NUMBER_PATTERNS = [
  /^Q(\d+)/,
  /^QUESTION\s*(?:NO)?[:.]?\s*(\d+)/i,
  /^(\d+)[.)]\s/,
];

/** Question number printed in the block header, 0 when there is none */
export function extractQuestionNumber(block: string): number {
  for (const pattern of QUESTION_NUMBER_PATTERNS) {
    const match = pattern.exec(block);
    if (match) return parseInt(match[1], 10);
  }
  return 0;
}

/** Offset of the first line that starts with a choice label, -1 when none */
export function choiceSectionStart(block: string): number {
  return /^[A-F][.)]/m.exec(block)?.index ?? -1;
}

export function extractQuestionText(block: string): string {
  let text = block
    .replace(/^Q\d+\n/gm, "")
    .replace(/^QUESTION\s*(?:NO)?[:.]?\s*\d+[:.\s]*/i, "")
    .replace(/^\d+[.)]\s+/, "");

  const choiceStart = choiceSectionStart(text);
  if (choiceStart >= 0) {
    text = text.slice(0, choiceStart);
  }

  return fixWordSpacingPreserveParagraphs(text);
}

// ------------------------------------------------------------------
// Choices
// ------------------------------------------------------------------

interface LabelHit {
  start: number;
  label: ChoiceLabel;
  textStart: number;
}

const LAST_CHOICE_END = /\b(?:Answer:|Explanation:|Reference:|Correct\s+Answer|Q\d+)/i;

const flattenLines = (text: string) => text.replace(/\n/g, " ").replace(/\s+/g, " ");

/**
 * Label hits from `from` on (an offset into the flattened text); labels in
 * the question body ("Subnet A.") come before it and are ignored.
 */
function findLabelHits(normalized: string, from: number): LabelHit[] {
  const hits: LabelHit[] = [];
  for (const label of CHOICE_LABELS) {
    const pattern = new RegExp(`(?:^|\\s|[.!?])(${label}[.)])`, "g");
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(normalized)) !== null) {
      const textStart = match.index + match[0].length;
      if (textStart - match[1].length >= from) {
        hits.push({ start: match.index, label, textStart });
      }
    }
  }

  hits.sort((a, b) => a.start - b.start || a.label.localeCompare(b.label) || a.textStart - b.textStart);

  // A label seen again later (e.g. "Answer: A." or "Subnet A.") is not a new choice
  const seen = new Set<ChoiceLabel>();
  return hits.filter((hit) => {
    if (seen.has(hit.label)) return false;
    seen.add(hit.label);
    return true;
  });
}

export function extractChoices(block: string): Choice[] {
  const normalized = flattenLines(block);
  const lineStart = choiceSectionStart(block);
  const from = lineStart >= 0 ? flattenLines(block.slice(0, lineStart)).length : 0;
  const hits = findLabelHits(normalized, from);
  const choices: Choice[] = [];

  hits.forEach((hit, i) => {
    let end: number;
    const next = hits[i + 1];
    if (next) {
      end = next.start;
    } else {
      const marker = LAST_CHOICE_END.exec(normalized.slice(hit.textStart));
      end = marker ? hit.textStart + marker.index : normalized.length;
    }

    const text = collapseWhitespace(fixWordSpacing(normalized.slice(hit.textStart, end).trim()));
    if (text) {
      choices.push({ label: hit.label, text });
    }
  });

  return choices;
}

// ------------------------------------------------------------------
// Correct answers
// ------------------------------------------------------------------

function captureLetters(pattern: RegExp): (block: string) => ChoiceLabel[] | null {
  return (block) => {
    const match = pattern.exec(block);
    if (!match) return null;
    const letters = match[1].toUpperCase().match(/[A-F]/g) ?? [];
    const labels = [...new Set(letters)].filter(isChoiceLabel);
    return labels.length > 0 ? labels : null;
  };
}

export type AnswerStrategy = "answer-line" | "correct-answer" | "answer-letter" | "markdown-answer";

/** Tried in order; the first one that matches wins */
export const ANSWER_STRATEGIES: readonly Strategy<ChoiceLabel[], AnswerStrategy>[] = [
  {
    name: "answer-line",
    apply: captureLetters(/Answer[:\s]+([A-F](?:[,\s]*[A-F])*?)(?=\n|Explanation|Reference|$)/i),
  },
  {
    name: "correct-answer",
    apply: captureLetters(/Correct\s+Answers?[:\s]+([A-F](?:[,\s]*[A-F])*)/i),
  },
  {
    name: "answer-letter",
    apply: captureLetters(/Answer[:\s]+([A-F])\b/i),
  },
  {
    name: "markdown-answer",
    apply: captureLetters(/\*\*Answers?\*\*[:\s]*([A-F](?:[,\s]*[A-F])*)/i),
  },
];

export function extractAnswers(block: string): ChoiceLabel[] {
  return firstMatch(ANSWER_STRATEGIES, block)?.value ?? [];
}

// ------------------------------------------------------------------
// Question type
// ------------------------------------------------------------------

export function determineQuestionType(questionText: string, choices: Choice[]): QuestionType {
  const lower = questionText.toLowerCase();
  if (MULTI_SELECT_CUES.some((cue) => lower.includes(cue))) {
    return "multi";
  }

  if (choices.length === 2) {
    const texts = new Set(choices.map((c) => c.text.trim().toLowerCase()));
    const isPair = (a: string, b: string) => texts.size === 2 && texts.has(a) && texts.has(b);
    if (isPair("true", "false") || isPair("yes", "no")) {
      return "truefalse";
    }
  }

  return "single";
}

// ------------------------------------------------------------------
// Explanation
// ------------------------------------------------------------------

/** Tried in this order; a marker is only used when no earlier one yields text */
const EXPLANATION_MARKERS = ["Explanation", "Reference", "Note"];

const explanationPattern = (marker: string) =>
  new RegExp(
    `\\b(?:${marker}|${marker.toUpperCase()}|${marker.toLowerCase()})\\b[:\\s]*([\\s\\S]+?)(?=\\bQ\\d+\\b|QUESTION|$)`,
    "g",
  );

/**
 * Where the answer part of a block begins: the first choice line, else the
 * first "Answer" line, else the block start. Series preambles ("Note: This
 * question is part of a series…") sit before it.
 */
function answerSectionStart(block: string): number {
  const choiceStart = choiceSectionStart(block);
  if (choiceStart >= 0) return choiceStart;
  return /^Answer\b/m.exec(block)?.index ?? 0;
}

/**
 * First "Explanation", then "Reference", then "Note" section of the answer
 * part that is long enough to be meaningful, whitespace-collapsed and capped.
 */
export function extractExplanation(block: string): string | null {
  const answerPart = block.slice(answerSectionStart(block));

  for (const marker of EXPLANATION_MARKERS) {
    const pattern = explanationPattern(marker);
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(answerPart)) !== null) {
      const explanation = collapseWhitespace(match[1]);
      if (explanation.length >= MIN_EXPLANATION_LENGTH) {
        return explanation.slice(0, MAX_EXPLANATION_LENGTH);
      }
    }
  }
  return null;
}

export function cleanStudyText(questionText: string): string {
  let text = questionText;
  for (const pattern of STUDY_BOILERPLATE) {
    text = text.replace(pattern, "");
  }
  text = text
    .replace(/Answer:\s*Explanation:[\s\S]*$/i, "")
    .replace(/\?\s*Answer:[\s\S]*$/i, "?");
  return fixWordSpacing(text);
}

export function extractStudyExplanation(
  block: string,
  questionText: string,
  kind: StudyKind,
  fallback: string | null,
): string {
  let explanation = fallback;

  const section = /Explanation[:\s]+([A-Z][^Q]+?)(?=Q\d+|$)/.exec(block);
  if (section) {
    const candidate = fixWordSpacing(section[1].trim());
    const repeatsQuestion = candidate
      .slice(0, 100)
      .toLowerCase()
      .includes(questionText.slice(0, 30).toLowerCase());
    explanation = candidate.length < MIN_STUDY_EXPLANATION_LENGTH || repeatsQuestion ? null : candidate;
  }

  if (!explanation) {
    const reference = /Reference[:\s]*(https?:\/\/\S+)/i.exec(block);
    if (reference) {
      explanation = `Reference: ${reference[1]}`;
    }
  }

  return explanation || STUDY_PLACEHOLDERS[kind];
}

// ------------------------------------------------------------------
// Block → question
// ------------------------------------------------------------------

/**
 * Parse one block. Returns null when the block has no question text.
 */
export function parseBlock(block: string): ParsedQuestion | null {
  const sourcePage = extractQuestionNumber(block);
  const studyKind = detectStudyKind(block);

  const questionText = extractQuestionText(block);
  if (!questionText) return null;

  const explanation = extractExplanation(block);

  if (studyKind) {
    const text = cleanStudyText(questionText);
    return createParsedQuestion({
      text,
      explanation: extractStudyExplanation(block, text, studyKind, explanation),
      questionType: "study",
      sourcePage,
    });
  }

  const choices = extractChoices(block);
  return createParsedQuestion({
    text: questionText,
    choices,
    correctAnswers: extractAnswers(block),
    explanation,
    questionType: determineQuestionType(questionText, choices),
    sourcePage,
  });
}
