/**
 * Question Series Detection
 *
 * Exams repeat one scenario across several questions ("This question is
 * part of a series…"), each proposing a different solution. Members share
 * a series id so they can be kept together or dropped together.
 *
 * The id is a fingerprint of the shared scenario: the question text with
 * the series preamble, the review-screen warning and the solution part
 * removed.
 */

import { createHash } from "crypto";
import { logIngest } from "@/lib/logger";
import type { ParsedQuestion } from "./types";

const SERIES_MARKERS = [
  /note:\s*this question is part of a series/i,
  /note:\s*the question is included in a number of questions/i,
  /part of a series of questions/i,
  /identical set-up/i,
  /depicts the identical/i,
  /same scenario/i,
  /questions that share the same/i,
  /questions that present the same scenario/i,
];

const CORE_SCENARIO_LENGTH = 200;

export function hasSeriesMarker(text: string): boolean {
  return SERIES_MARKERS.some((marker) => marker.test(text));
}

export function extractCoreScenario(text: string): string {
  let core = text
    .replace(/^Note:[\s\S]*?(?=You have|You are|Your company|A company)/i, "")
    .replace(/After you answer a question in this section[\s\S]*?review screen\.?\s*/gi, "");

  const solution = /Solution:|Does that meet|What should you/i.exec(core);
  if (solution) {
    core = core.slice(0, solution.index);
  }

  core = core
    .replace(/Your company's Azure solution/gi, "Your company")
    .replace(/Your company's/gi, "Your company")
    .replace(/makes use of/gi, "uses");

  return core.replace(/\s+/g, " ").trim().slice(0, CORE_SCENARIO_LENGTH);
}

/** 12-hex-char scenario fingerprint; null when nothing of the scenario is left */
export function scenarioFingerprint(text: string): string | null {
  const core = extractCoreScenario(text);
  if (!core) return null;
  return createHash("sha256").update(core).digest("hex").slice(0, 12);
}

/**
 * Assign series ids in place. Questions carrying a series marker found
 * series; the remaining questions join a series whose scenario they share.
 */
export function detectSeries(questions: ParsedQuestion[]): void {
  const known = new Set<string>();

  const unmarked: ParsedQuestion[] = [];
  for (const question of questions) {
    if (!hasSeriesMarker(question.text)) {
      unmarked.push(question);
      continue;
    }

    const fingerprint = scenarioFingerprint(question.text);
    if (!fingerprint) continue;

    if (!known.has(fingerprint)) {
      known.add(fingerprint);
      logIngest("series.detected", {
        message: `Detected series at Q${question.sourcePage}`,
        seriesId: fingerprint,
      });
    }
    question.seriesId = fingerprint;
  }

  for (const question of unmarked) {
    if (question.seriesId) continue;
    const fingerprint = scenarioFingerprint(question.text);
    if (fingerprint && known.has(fingerprint)) {
      question.seriesId = fingerprint;
      logIngest("series.linked", {
        message: `Linked Q${question.sourcePage} to series`,
        seriesId: fingerprint,
      });
    }
  }
}

/** Series id → members ordered by sequence number */
export function groupBySeries(questions: ParsedQuestion[]): Map<string, ParsedQuestion[]> {
  const groups = new Map<string, ParsedQuestion[]>();
  for (const question of questions) {
    if (!question.seriesId) continue;
    const members = groups.get(question.seriesId) ?? [];
    members.push(question);
    groups.set(question.seriesId, members);
  }
  for (const members of groups.values()) {
    members.sort((a, b) => a.sequenceNumber - b.sequenceNumber);
  }
  return groups;
}

/** Drop every member of a series at once */
export function withoutSeries(questions: ParsedQuestion[], seriesId: string): ParsedQuestion[] {
  return questions.filter((q) => q.seriesId !== seriesId);
}
