/**
 * Core types for recordkit
 */

import type { FieldSpecs } from "./fields.js";
import type { StoredRecord } from "./record.js";
import type { RecordType } from "./record-type.js";

/**
 * Validation mode
 * - strict: no type coercion of scalars
 * - lenient: scalars are coerced where the schema asks for another type (e.g. INI strings to numbers)
 */
export type ValidationMode = "strict" | "lenient";

/**
 * Validation issue codes
 */
export type ValidationIssueCode =
  | "required"
  | "type"
  | "enum"
  | "format"
  | "additional"
  | "reference"
  | "custom"
  | "pattern"
  | "minimum"
  | "maximum"
  | "minLength"
  | "maxLength";

/**
 * A single validation failure
 */
export interface ValidationIssue {
  /** Code categorizing the failure */
  code: ValidationIssueCode;
  /** JSON Pointer to the failing value (e.g., "/address/city") */
  pointer: string;
  /** Top-level field the failure belongs to ("" for the record as a whole) */
  field: string;
  /** Human-readable message */
  message: string;
  /** Additional context about the failure */
  context?: Record<string, unknown>;
}

/**
 * Result of validating one record's fields
 */
export interface ValidationResult {
  /** True if validation passed */
  ok: boolean;
  /** Issues found (empty if ok is true) */
  issues: ValidationIssue[];
  /** Fields after defaults and (in lenient mode) coercion were applied */
  fields: Record<string, unknown>;
}

/**
 * Custom string format validator
 */
export type FormatValidator = (value: string) => boolean;

/**
 * Validates normalized fields against a record type's descriptors
 */
export interface RecordValidator {
  /**
   * Validate normalized fields
   * @param type - Record type whose descriptors apply
   * @param fields - Normalized field values
   * @param mode - Overrides the validator's default mode
   */
  validate<S extends FieldSpecs>(
    type: RecordType<S>,
    fields: Record<string, unknown>,
    mode?: ValidationMode
  ): ValidationResult;

  /**
   * Register custom string formats
   * @param formats - Map of format name to validator function
   */
  registerFormats(formats: Record<string, FormatValidator>): void;

  /** Mode used when validate() is called without one */
  readonly mode: ValidationMode;
}

/**
 * Renders a record into text
 */
export interface Renderer {
  /**
   * Render a record through its type's template
   * @param record - Record whose plain field mapping is the template context
   * @param extraVars - Additional variables, overriding fields of the same name
   */
  render<S extends FieldSpecs>(record: StoredRecord<S>, extraVars?: Record<string, unknown>): string;
}

/**
 * Parses serialized text into nested data
 */
export type Loader = (text: string) => unknown;

/**
 * Serializes nested data into text
 */
export type Dumper = (data: unknown) => string;
