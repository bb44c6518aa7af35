/**
 * Ingestion errors
 *
 * Only failures that stop a document or a run are thrown. Data-quality
 * problems are reported as question issues and report counters.
 */

/** No text extraction backend can be loaded. Fatal for the whole run. */
export class ExtractionUnavailableError extends Error {
  constructor(public readonly attempted: string[]) {
    super(
      attempted.length > 0
        ? `No PDF extraction backend available (tried: ${attempted.join(", ")})`
        : "No PDF extraction backend available",
    );
    this.name = "ExtractionUnavailableError";
  }
}

/** A backend failed on one document; the batch continues. */
export class DocumentExtractionError extends Error {
  constructor(
    public readonly filename: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DocumentExtractionError";
  }
}

/** The domain taxonomy file is missing, unreadable or malformed. */
export class TaxonomyConfigError extends Error {
  constructor(
    public readonly path: string,
    public readonly details: string[],
  ) {
    super(`Invalid domain taxonomy at ${path}: ${details.join("; ")}`);
    this.name = "TaxonomyConfigError";
  }
}
