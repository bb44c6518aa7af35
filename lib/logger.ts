/**
 * Ingest Logger - Unified logging for the ingestion pipeline
 *
 * Logs are written to: <logging.dir>/ingest.jsonl (one JSON object per line)
 *
 * Log types:
 *   - ingest: document parsing, block extraction, series/exhibit linking
 *   - extraction: text extraction backends
 *   - storage: exhibit image writes
 *   - system: configuration and CLI events
 *
 * Warnings and errors are mirrored to the console.
 *
 * Usage:
 *   import { logIngest } from "@/lib/logger";
 *   logIngest("parse.document", { message: "Parsed", questions: 12 });
 */

import { appendFileSync, mkdirSync, existsSync } from "fs";
import { join } from "path";
import { config } from "@/lib/config";

// =====================================================
// TYPES
// =====================================================

export type LogType = "ingest" | "extraction" | "storage" | "system";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  type: LogType;
  level: LogLevel;
  stage: string;
  message?: string;
  durationMs?: number;
  metadata?: Record<string, unknown>;
}

export interface LogData {
  level?: LogLevel;
  message?: string;
  durationMs?: number;
  [key: string]: unknown;
}

// =====================================================
// CORE LOGGING
// =====================================================

export function getLogFilePath(): string {
  return join(config.logging.dir, "ingest.jsonl");
}

function mirrorToConsole(entry: LogEntry): void {
  const line = `[${entry.stage}] ${entry.message ?? ""}`.trimEnd();
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  }
}

/**
 * Write a log entry
 */
export function log(type: LogType, stage: string, data?: LogData): void {
  const { level = "info", message, durationMs, ...metadata } = data ?? {};
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    type,
    level,
    stage,
    message,
    durationMs,
    metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
  };

  mirrorToConsole(entry);

  if (!config.logging.enabled) return;

  try {
    const dir = config.logging.dir;
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    appendFileSync(getLogFilePath(), JSON.stringify(entry) + "\n");
  } catch (error) {
    console.error("[Logger] Failed to write log:", error);
  }
}

/**
 * Log a pipeline event
 */
export function logIngest(stage: string, data?: LogData): void {
  log("ingest", stage, data);
}

/**
 * Log a text extraction backend event
 */
export function logExtraction(stage: string, data?: LogData): void {
  log("extraction", stage, data);
}

/**
 * Log an exhibit storage event
 */
export function logStorage(stage: string, data?: LogData): void {
  log("storage", stage, data);
}

/**
 * Log a system event
 */
export function logSystem(event: string, data?: LogData): void {
  log("system", event, data);
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
