/**
 * Error types for recordkit operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Errors are raised to the immediate caller; nothing in the core retries or suppresses them
 */

import type { ValidationIssue } from "./types.js";

/**
 * Base class for all recordkit errors
 */
export abstract class RecordKitError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a record is constructed outside the lifecycle, or a record type is declared wrongly
 */
export class InitializationError extends RecordKitError {
  readonly code = "E_INIT";
}

/**
 * Thrown when data has the wrong shape or type
 */
export class RecordTypeError extends RecordKitError {
  readonly code: string = "E_TYPE";
}

/**
 * Thrown when normalized fields fail validation for their record type
 */
export class RecordValidationError extends RecordTypeError {
  override readonly code = "E_VALIDATION";

  constructor(
    public readonly typeName: string,
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(
      `${typeName}: invalid fields: ${issues.map((issue) => `${issue.field || "(record)"} (${issue.message})`).join("; ")}`,
      options
    );
  }

  /**
   * Names of the offending fields, without repeats
   */
  get fields(): string[] {
    return [...new Set(this.issues.map((issue) => issue.field))];
  }
}

/**
 * Thrown when a value is of the right type but unacceptable (e.g. an empty one-to-many)
 */
export class RecordValueError extends RecordKitError {
  readonly code = "E_VALUE";
}

/**
 * Thrown when saving a duplicate record whose type forbids duplicates
 */
export class AlreadyExistsError extends RecordKitError {
  readonly code = "E_EXISTS";

  constructor(
    public readonly typeName: string,
    public readonly keyFields: readonly string[],
    public readonly keyValues: readonly unknown[],
    options?: ErrorOptions
  ) {
    super(
      `${typeName}: duplicates not allowed. Make sure there's no other ${typeName} with fields ` +
        `(${keyFields.join(", ")}) associated with values (${keyValues.map((v) => JSON.stringify(v)).join(", ")}), respectively.`,
      options
    );
  }
}

/**
 * Thrown when get() finds no matching record
 */
export class DoesNotExistError extends RecordKitError {
  readonly code = "E_NOT_FOUND";

  constructor(typeName: string, where: object, options?: ErrorOptions) {
    super(`A ${typeName} record was not found matching params: ${JSON.stringify(where)}`, options);
  }
}

/**
 * Thrown when get() finds more than one matching record
 */
export class MultipleReturnedError extends RecordKitError {
  readonly code = "E_MULTIPLE";

  constructor(
    typeName: string,
    public readonly count: number,
    where: object,
    options?: ErrorOptions
  ) {
    super(`${count} ${typeName} records found matching params: ${JSON.stringify(where)}`, options);
  }
}

/**
 * Thrown on an attempt to replace the store's collections wholesale
 */
export class DirectAssignmentError extends RecordKitError {
  readonly code = "E_ASSIGN";
}

/**
 * Thrown when a configured module, loader or dumper cannot be found
 */
export class ModuleImportError extends RecordKitError {
  readonly code = "E_IMPORT";
}

/**
 * Thrown when a file's extension has no loader
 */
export class UnsupportedFormatError extends RecordKitError {
  readonly code = "E_FORMAT";

  constructor(
    public readonly format: string,
    public readonly supported: readonly string[],
    options?: ErrorOptions
  ) {
    super(`File extension "${format}" not supported. Supported formats are: ${supported.join(", ")}`, options);
  }
}

/**
 * Thrown when serializing data fails
 */
export class DumperError extends RecordKitError {
  readonly code = "E_DUMP";

  constructor(format: string, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to dump data as ${format}${reason}`, options);
  }
}

/**
 * Thrown when a record's template cannot be found or rendered
 */
export class RenderingError extends RecordKitError {
  readonly code = "E_RENDER";

  constructor(
    public readonly template: string,
    options?: ErrorOptions
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to render template "${template}"${reason}`, options);
  }
}

/**
 * Thrown when environment configuration is invalid
 */
export class ConfigError extends RecordKitError {
  readonly code = "E_CONFIG";
}
