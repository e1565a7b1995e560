/**
 * Error types raised by the ontology services.
 *
 * Clip-level validation problems are not exceptions: they are reported as
 * `ValidationFailure` records in the merge summary (see services/validation.ts).
 */

export type OntologyErrorCode = "persistence" | "config" | "schema" | "not_found" | "duplicate";

export class OntologyError extends Error {
  readonly code: OntologyErrorCode;

  constructor(code: OntologyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OntologyError";
    this.code = code;
  }
}

/**
 * Durable state could not be read or written. The merge that hit it has not
 * changed the committed ontology.
 */
export class PersistenceError extends OntologyError {
  readonly path: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super("persistence", `${message}: ${filePath}`, { cause });
    this.name = "PersistenceError";
    this.path = filePath;
  }
}

export class ConfigError extends OntologyError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export class SchemaError extends OntologyError {
  constructor(message: string) {
    super("schema", message);
    this.name = "SchemaError";
  }
}

export class NotFoundError extends OntologyError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

/** The video is already in the processing log */
export class DuplicateVideoError extends OntologyError {
  constructor(readonly videoId: string) {
    super("duplicate", `Video "${videoId}" has already been merged (pass force to merge it again)`);
    this.name = "DuplicateVideoError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
