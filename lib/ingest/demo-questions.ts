/**
 * Demo questions, offered by a scan that finds no documents.
 */

import { readFile } from "fs/promises";
import { config } from "@/lib/config";
import { validate, demoQuestionsFileSchema } from "@/lib/validation";
import { createParsedQuestion, type ParsedQuestion } from "./types";

export async function loadDemoQuestions(path: string = config.paths.demoQuestions): Promise<ParsedQuestion[]> {
  const result = validate(demoQuestionsFileSchema, JSON.parse(await readFile(path, "utf-8")));
  if (!result.ok) {
    throw new Error(`Invalid demo questions at ${path}: ${result.errors.join("; ")}`);
  }

  return result.data.map((demo, index) =>
    createParsedQuestion({
      ...demo,
      sourcePage: 1,
      sequenceNumber: index + 1,
    }),
  );
}
