/**
 * Extraction Backend Factory
 *
 * Resolves the backend for a run. "auto" takes the first available backend
 * in preference order (pdf-parse, then pdfjs).
 */

import { config, type ExtractionBackendPreference } from "@/lib/config";
import { ExtractionUnavailableError } from "@/lib/ingest/errors";
import { logExtraction } from "@/lib/logger";
import type { ExtractionAdapter } from "./adapter";
import { PdfParseAdapter } from "./pdf-parse";
import { PdfjsAdapter } from "./pdfjs";

export function defaultExtractionAdapters(): ExtractionAdapter[] {
  return [new PdfParseAdapter(), new PdfjsAdapter()];
}

/**
 * @throws ExtractionUnavailableError when no candidate can be loaded
 */
export async function resolveExtractionAdapter(
  preference: ExtractionBackendPreference = config.extraction.backend,
  candidates: ExtractionAdapter[] = defaultExtractionAdapters(),
): Promise<ExtractionAdapter> {
  const ordered =
    preference === "auto" ? candidates : candidates.filter((adapter) => adapter.name === preference);

  const attempted: string[] = [];
  for (const adapter of ordered) {
    attempted.push(adapter.name);
    if (await adapter.isAvailable()) {
      logExtraction("backend.resolved", { message: `Using ${adapter.name}`, preference });
      return adapter;
    }
    logExtraction("backend.unavailable", { level: "warn", message: `${adapter.name} could not be loaded` });
  }

  throw new ExtractionUnavailableError(attempted.length > 0 ? attempted : [preference]);
}

export type { ExtractionAdapter, ExtractionBackend, ExtractionSession, PageImage } from "./adapter";
export { PdfParseAdapter } from "./pdf-parse";
export { PdfjsAdapter, renderPageText } from "./pdfjs";
export { formatTableAsText, mergeTablesWithText } from "./tables";
