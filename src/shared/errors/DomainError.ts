import { AppError } from "./AppError";

/**
 * Domain-level errors
 *
 * These represent failures of the scripture domain itself, independent of HTTP
 */

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }

  toJSON() {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

export class EntityNotFoundError extends AppError {
  constructor(
    public readonly entityName: string,
    public readonly id: string,
  ) {
    super(`${entityName} with id ${id} not found`, "ENTITY_NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}

export class NoTranslationsError extends AppError {
  constructor() {
    super("No translations available", "NO_TRANSLATIONS");
    this.name = "NoTranslationsError";
  }
}

/**
 * A reference string outside the supported grammar
 */
export class UnparsableReferenceError extends AppError {
  constructor(
    public readonly reference: string,
    public readonly reason: string,
  ) {
    super(`Cannot parse reference "${reference}": ${reason}`, "UNPARSABLE_REFERENCE");
    this.name = "UnparsableReferenceError";
  }

  toJSON() {
    return {
      ...super.toJSON(),
      reference: this.reference,
    };
  }
}

/**
 * The document source could not be reached or listed
 */
export class SourceUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "SOURCE_UNAVAILABLE", false);
    this.name = "SourceUnavailableError";
    this.cause = cause;
  }
}

export class MalformedSourceError extends AppError {
  constructor(
    public readonly sourcePath: string,
    detail: string,
  ) {
    super(`Malformed document ${sourcePath}: ${detail}`, "MALFORMED_SOURCE");
    this.name = "MalformedSourceError";
  }

  toJSON() {
    return {
      ...super.toJSON(),
      sourcePath: this.sourcePath,
    };
  }
}
