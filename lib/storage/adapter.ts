/**
 * Exhibit Store Interface
 *
 * Pluggable backend for exhibit images cut out of exam documents.
 * Implementations: Local (filesystem). Tests use an in-memory fake.
 */

export interface SaveResult {
  /** File name under the store root */
  fileName: string;
  /** SHA-256 of the stored bytes */
  contentHash: string;
  /** False when identical bytes were already stored under this name */
  written: boolean;
}

export interface ExhibitStore {
  /** Store image bytes under the given file name */
  save(bytes: Uint8Array, fileName: string): Promise<SaveResult>;

  /** Check if a file exists */
  exists(fileName: string): Promise<boolean>;
}
