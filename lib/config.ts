/**
 * Centralized Configuration
 *
 * Single source of truth for all environment variables.
 * - Provides typed access with sensible defaults
 * - Values are read lazily, so tests can set env vars before first access
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const dir = config.paths.exhibits;
 *   const backend = config.extraction.backend;
 */

// =============================================================================
// Helpers
// =============================================================================

function optional(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    console.warn(`Invalid integer for ${name}: "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function optionalBool(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function optionalEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  const value = process.env[name];
  if (!value) return defaultValue;
  const match = allowed.find((a) => a === value.toLowerCase());
  if (!match) {
    console.warn(`Invalid value for ${name}: "${value}" (expected ${allowed.join(", ")}), using default: ${defaultValue}`);
    return defaultValue;
  }
  return match;
}

// =============================================================================
// Configuration Object
// =============================================================================

export const EXTRACTION_BACKEND_PREFERENCES = ["auto", "pdf-parse", "pdfjs"] as const;
export type ExtractionBackendPreference = (typeof EXTRACTION_BACKEND_PREFERENCES)[number];

export const config = {
  // ---------------------------------------------------------------------------
  // File Paths
  // ---------------------------------------------------------------------------
  paths: {
    /** Directory scanned for exam documents */
    get documents(): string {
      return optional("INGEST_DOCUMENTS_DIR", "./pdfs");
    },
    /** Directory that receives extracted exhibit images */
    get exhibits(): string {
      return optional("INGEST_EXHIBITS_DIR", "./static/exhibits");
    },
    /** Domain taxonomy JSON */
    get domainsConfig(): string {
      return optional("INGEST_DOMAINS_CONFIG", "./config/domains.json");
    },
    /** Import ledger JSON (filename + hash + status per processed document) */
    get importLedger(): string {
      return optional("INGEST_IMPORT_LEDGER", "./data/import-ledger.json");
    },
    /** Demo questions offered when no documents are found */
    get demoQuestions(): string {
      return optional("INGEST_DEMO_QUESTIONS", "./config/demo-questions.json");
    },
  },

  // ---------------------------------------------------------------------------
  // Exhibits
  // ---------------------------------------------------------------------------
  exhibits: {
    /** Prefix of the reference path recorded on a question */
    get urlPrefix(): string {
      return optional("INGEST_EXHIBITS_URL_PREFIX", "/static/exhibits").replace(/\/+$/, "");
    },
  },

  // ---------------------------------------------------------------------------
  // Extraction
  // ---------------------------------------------------------------------------
  extraction: {
    /** Preferred text extraction backend */
    get backend(): ExtractionBackendPreference {
      return optionalEnum("INGEST_EXTRACTION_BACKEND", EXTRACTION_BACKEND_PREFERENCES, "auto");
    },
    /** Documents above this size are reported as failed without being opened */
    get maxPdfSizeMB(): number {
      return optionalInt("INGEST_MAX_PDF_SIZE_MB", 100);
    },
  },

  // ---------------------------------------------------------------------------
  // Logging
  // ---------------------------------------------------------------------------
  logging: {
    get enabled(): boolean {
      return optionalBool("INGEST_LOG_ENABLED", true);
    },
    /** Directory holding ingest.jsonl */
    get dir(): string {
      return optional("INGEST_LOG_DIR", "./logs");
    },
  },
} as const;

export type Config = typeof config;
