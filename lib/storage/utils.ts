/**
 * Storage utilities — hashing, extensions, exhibit file names
 */

import { createHash } from "crypto";

/** Compute SHA-256 content hash of a buffer */
export function computeContentHash(buffer: Uint8Array): string {
  return createHash("sha256").update(buffer).digest("hex");
}

/** Get file extension from an image format name ("png", "jpeg", "image/png", …) */
export function extensionFromFormat(format: string): string {
  const map: Record<string, string> = {
    png: "png",
    jpeg: "jpg",
    jpg: "jpg",
    gif: "gif",
    webp: "webp",
    bmp: "bmp",
    tiff: "tiff",
  };
  const key = format.toLowerCase().replace(/^image\//, "");
  return map[key] || "bin";
}

/**
 * Exhibit file name.
 * Format: q{sourcePage}_{first-8-of-stable-id}_img{index}.{ext}
 */
export function exhibitFileName(sourcePage: number, questionId: string, index: number, format: string): string {
  return `q${sourcePage}_${questionId.slice(0, 8)}_img${index}.${extensionFromFormat(format)}`;
}

/** Reject names that would escape the store root */
export function isSafeFileName(fileName: string): boolean {
  return /^[\w.-]+$/.test(fileName) && !fileName.startsWith(".");
}
