/**
 * Storage Factory
 *
 * Builds the exhibit store for a run. Callers own the instance.
 */

import { config } from "@/lib/config";
import type { ExhibitStore } from "./adapter";
import { LocalExhibitStore } from "./local";

export function createExhibitStore(dir: string = config.paths.exhibits): ExhibitStore {
  return new LocalExhibitStore(dir);
}

export type { ExhibitStore, SaveResult } from "./adapter";
export { LocalExhibitStore } from "./local";
export { computeContentHash, exhibitFileName, extensionFromFormat } from "./utils";
