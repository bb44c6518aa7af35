/**
 * Validation helpers for files and reviewer input.
 *
 * Usage:
 *   const v = validate(taxonomySchema, JSON.parse(raw));
 *   if (!v.ok) throw new TaxonomyConfigError(path, v.errors);
 *   const { domains } = v.data;
 */

import { type ZodTypeAny, type output, ZodError } from "zod";

type ValidationSuccess<T> = { ok: true; data: T };
type ValidationFailure = { ok: false; errors: string[] };

export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

export function validate<S extends ZodTypeAny>(schema: S, value: unknown): ValidationResult<output<S>> {
  try {
    const data = schema.parse(value);
    return { ok: true, data };
  } catch (err) {
    if (err instanceof ZodError) {
      return {
        ok: false,
        errors: err.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        ),
      };
    }
    throw err;
  }
}

// Re-export schemas for convenience
export * from "./schemas";
