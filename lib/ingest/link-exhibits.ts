/**
 * Exhibit Linking
 *
 * Questions that refer to an exhibit or a table get the first sizeable
 * image from the document page they appear on (or the page before, where
 * exhibits are often printed). The image is written through the exhibit
 * store and its reference path recorded on the question.
 *
 * Note: sourcePage is the printed question number, not a document page, so
 * the page is found by searching for the question's opening text.
 */

import type { ExtractionSession, PageImage } from "@/lib/extraction/adapter";
import { errorMessage, logIngest } from "@/lib/logger";
import type { ExhibitStore } from "@/lib/storage/adapter";
import { exhibitFileName } from "@/lib/storage/utils";
import { stableId, type ParseReport, type ParsedQuestion } from "./types";

// ------------------------------------------------------------------
// Constants
// ------------------------------------------------------------------

const EXHIBIT_CUES = [
  "following exhibit",
  "shown in the following",
  "as shown in",
  "following diagram",
  "following image",
  "exhibit",
  "shown below",
];

const TABLE_CUES = [
  "following users",
  "following resources",
  "following table",
  "following virtual machines",
  "following storage accounts",
  "following subscriptions",
  "contains the following",
  "following information",
  "following configuration",
  "following azure",
  "following settings",
];

/** Icons and logos are smaller than this */
export const MIN_IMAGE_BYTES = 5000;
/** Non-table images must be at least this large */
export const MIN_EXHIBIT_BYTES = 10000;

export const DEFAULT_EXHIBIT_URL_PREFIX = "/static/exhibits";

// ------------------------------------------------------------------
// Matching
// ------------------------------------------------------------------

export function hasExhibitCue(text: string): boolean {
  const lower = text.toLowerCase();
  return EXHIBIT_CUES.some((cue) => lower.includes(cue));
}

export function hasTableCue(text: string): boolean {
  const lower = text.toLowerCase();
  return TABLE_CUES.some((cue) => lower.includes(cue));
}

const normalize = (text: string) => text.replace(/\s+/g, " ").toLowerCase();

/**
 * Document page whose text contains the question's opening (first 200
 * characters, then 100), whitespace-normalized. 0 when not found.
 */
export function findDocumentPage(questionText: string, pages: Map<number, string>): number {
  if (!questionText) return 0;

  const ordered = [...pages.entries()]
    .sort(([a], [b]) => a - b)
    .map(([page, text]) => [page, normalize(text)] as const);

  for (const prefixLength of [200, 100]) {
    const needle = normalize(questionText.slice(0, prefixLength));
    const found = ordered.find(([, text]) => text.includes(needle));
    if (found) return found[0];
  }
  return 0;
}

export function isTableLike(image: Pick<PageImage, "width" | "height">): boolean {
  return image.width > 300 && image.height > 50 && image.width / Math.max(image.height, 1) > 1.5;
}

/** First image that is a table render or a sizeable exhibit */
export function selectExhibitImage(images: PageImage[]): { image: PageImage; index: number } | null {
  for (const [index, image] of images.entries()) {
    if (image.bytes.length < MIN_IMAGE_BYTES) continue;
    if (isTableLike(image) || image.bytes.length >= MIN_EXHIBIT_BYTES) {
      return { image, index };
    }
  }
  return null;
}

// ------------------------------------------------------------------
// Linking
// ------------------------------------------------------------------

export interface LinkExhibitsOptions {
  session: ExtractionSession;
  store: ExhibitStore;
  /** Prefix of the recorded reference path (no trailing slash) */
  urlPrefix?: string;
}

async function candidateImages(session: ExtractionSession, page: number): Promise<PageImage[]> {
  const images = await session.images(page);
  if (images.length > 0 || page <= 1) return images;
  return session.images(page - 1);
}

/**
 * Link at most one image per question. Failures are per question: logged,
 * added to report.warnings, and the other questions continue.
 */
export async function linkExhibits(
  questions: ParsedQuestion[],
  pages: Map<number, string>,
  report: ParseReport,
  { session, store, urlPrefix = DEFAULT_EXHIBIT_URL_PREFIX }: LinkExhibitsOptions,
): Promise<number> {
  let linked = 0;

  for (const question of questions) {
    if (!hasExhibitCue(question.text) && !hasTableCue(question.text)) continue;

    const page = findDocumentPage(question.text, pages);
    if (page === 0) continue;

    try {
      const selected = selectExhibitImage(await candidateImages(session, page));
      if (!selected) continue;

      const { image, index } = selected;
      const fileName = exhibitFileName(question.sourcePage, stableId(question), index, image.format);
      await store.save(image.bytes, fileName);

      question.exhibitImage = `${urlPrefix}/${fileName}`;
      linked++;

      logIngest("exhibit.linked", {
        message: `Extracted ${isTableLike(image) ? "table" : "exhibit"} image for Q${question.sourcePage}`,
        fileName,
        width: image.width,
        height: image.height,
      });
    } catch (error) {
      const warning = `Exhibit for Q${question.sourcePage} not linked: ${errorMessage(error)}`;
      report.warnings.push(warning);
      logIngest("exhibit.failed", { level: "warn", message: warning });
    }
  }

  return linked;
}
