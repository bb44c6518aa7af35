/**
 * Text Extraction Adapter Interface
 *
 * Pluggable PDF backend. Implementations: pdf-parse (text, tables, images),
 * pdfjs-dist (text only). A session is opened per document and must be
 * closed by the caller.
 */

export type ExtractionBackend = "pdf-parse" | "pdfjs";

export interface PageImage {
  bytes: Uint8Array;
  /** File format of `bytes` ("png", "jpeg", …) */
  format: string;
  width: number;
  height: number;
}

export interface ExtractionSession {
  /** Page number (1-based) → page text, tables merged in where supported */
  extractPages(): Promise<Map<number, string>>;

  /** Embedded images of one page; empty when the backend has no image support */
  images(pageNumber: number): Promise<PageImage[]>;

  /** Release the document */
  close(): Promise<void>;
}

export interface ExtractionAdapter {
  readonly name: ExtractionBackend;

  /** Whether the backing library can be loaded */
  isAvailable(): Promise<boolean>;

  /** Open a PDF held in memory */
  open(data: Uint8Array): Promise<ExtractionSession>;
}
