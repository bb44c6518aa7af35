/**
 * Import Ledger
 *
 * Records which documents (by name and content hash) were already imported,
 * so a rescan skips them. A document whose bytes change is parsed again.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { logIngest } from "@/lib/logger";
import { validate, ledgerFileSchema, type LedgerEntry } from "@/lib/validation";

export type NewLedgerEntry = Omit<LedgerEntry, "importedAt"> & { importedAt?: string };

export interface ImportLedger {
  /** True when this exact file content was imported successfully */
  isCompleted(filename: string, fileHash: string): Promise<boolean>;

  record(entry: NewLedgerEntry): Promise<LedgerEntry>;

  entries(): Promise<LedgerEntry[]>;
}

function toEntry(entry: NewLedgerEntry): LedgerEntry {
  return { ...entry, importedAt: entry.importedAt ?? new Date().toISOString() };
}

function hasCompleted(entries: LedgerEntry[], filename: string, fileHash: string): boolean {
  return entries.some((e) => e.filename === filename && e.fileHash === fileHash && e.status === "completed");
}

export class MemoryImportLedger implements ImportLedger {
  private readonly items: LedgerEntry[] = [];

  constructor(initial: LedgerEntry[] = []) {
    this.items.push(...initial);
  }

  async isCompleted(filename: string, fileHash: string): Promise<boolean> {
    return hasCompleted(this.items, filename, fileHash);
  }

  async record(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const stored = toEntry(entry);
    this.items.push(stored);
    return stored;
  }

  async entries(): Promise<LedgerEntry[]> {
    return [...this.items];
  }
}

/**
 * Ledger kept in a JSON file ({ entries: [...] }). A missing file is an
 * empty ledger; a malformed one is an error.
 */
export class JsonFileImportLedger implements ImportLedger {
  constructor(private readonly path: string) {}

  private async load(): Promise<LedgerEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
      throw e;
    }

    const result = validate(ledgerFileSchema, JSON.parse(raw));
    if (!result.ok) {
      throw new Error(`Invalid import ledger at ${this.path}: ${result.errors.join("; ")}`);
    }
    return result.data.entries;
  }

  async isCompleted(filename: string, fileHash: string): Promise<boolean> {
    return hasCompleted(await this.load(), filename, fileHash);
  }

  async record(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const entries = await this.load();
    const stored = toEntry(entry);
    entries.push(stored);

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify({ entries }, null, 2) + "\n");

    logIngest("ledger.recorded", { message: `${stored.status}: ${stored.filename}`, path: this.path });
    return stored;
  }

  async entries(): Promise<LedgerEntry[]> {
    return this.load();
  }
}
