/**
 * Local Filesystem Exhibit Store
 *
 * Writes exhibit images under a single directory, created on first save.
 */

import { mkdir, writeFile, access, readFile } from "fs/promises";
import { join } from "path";
import { logStorage } from "@/lib/logger";
import type { ExhibitStore, SaveResult } from "./adapter";
import { computeContentHash, isSafeFileName } from "./utils";

export class LocalExhibitStore implements ExhibitStore {
  constructor(private readonly basePath: string) {}

  private fullPath(fileName: string): string {
    if (!isSafeFileName(fileName)) {
      throw new Error(`Invalid exhibit file name: ${fileName}`);
    }
    return join(this.basePath, fileName);
  }

  async save(bytes: Uint8Array, fileName: string): Promise<SaveResult> {
    const filePath = this.fullPath(fileName);
    const contentHash = computeContentHash(bytes);

    // Same name, same bytes: nothing to do
    if (await this.exists(fileName)) {
      const existing = await readFile(filePath);
      if (computeContentHash(existing) === contentHash) {
        return { fileName, contentHash, written: false };
      }
    }

    await mkdir(this.basePath, { recursive: true });
    await writeFile(filePath, bytes);
    logStorage("exhibit.saved", { message: fileName, bytes: bytes.length });

    return { fileName, contentHash, written: true };
  }

  async exists(fileName: string): Promise<boolean> {
    try {
      await access(this.fullPath(fileName));
      return true;
    } catch {
      return false;
    }
  }
}
