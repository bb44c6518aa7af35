/**
 * Block Segmentation
 *
 * Splits the concatenated document text into one block per question.
 * Documents disagree on how questions are headed ("Q12", "QUESTION NO: 12",
 * "12."), so three split patterns are tried in order; a pattern is used
 * only when it yields at least two blocks.
 */

import { firstMatch, type Strategy } from "./strategies";

export type SplitStrategy = "explicit-marker" | "question-keyword" | "numbered";
export type SegmentationStrategy = SplitStrategy | "single-block";

export interface SegmentationResult {
  strategy: SegmentationStrategy;
  blocks: string[];
}

function splitBefore(pattern: RegExp): (text: string) => string[] | null {
  return (text) => {
    const blocks = text
      .split(pattern)
      .map((b) => b.trim())
      .filter((b) => b.length > 0);
    return blocks.length >= 2 ? blocks : null;
  };
}

export const SEGMENTATION_STRATEGIES: readonly Strategy<string[], SplitStrategy>[] = [
  { name: "explicit-marker", apply: splitBefore(/(?=^Q\d+\n)/m) },
  { name: "question-keyword", apply: splitBefore(/(?=QUESTION\s*(?:NO)?[:.]?\s*\d+)/i) },
  { name: "numbered", apply: splitBefore(/(?=^\d+[.)]\s+)/m) },
];

export function segmentBlocks(text: string): SegmentationResult {
  const match = firstMatch(SEGMENTATION_STRATEGIES, text);
  if (match) {
    return { strategy: match.strategy, blocks: match.value };
  }

  const whole = text.trim();
  return { strategy: "single-block", blocks: whole ? [whole] : [] };
}

export function splitIntoBlocks(text: string): string[] {
  return segmentBlocks(text).blocks;
}
