/**
 * Record field validator with mode support and error normalization
 */

import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import type { FieldSpec, FieldSpecs } from "../fields.js";
import type { RecordType } from "../record-type.js";
import type {
  FormatValidator,
  RecordValidator,
  ValidationIssue,
  ValidationIssueCode,
  ValidationMode,
  ValidationResult,
} from "../types.js";
import { describeValue, isHashable, isScalar } from "../values.js";
import { OneToMany } from "../one-to-many.js";
import { HashableMap } from "../hashable-map.js";
import { DEFAULT_FORMATS } from "./formats.js";
import { buildJsonSchema } from "./json-schema.js";

export interface RecordValidatorOptions {
  /** Default mode (default: "strict") */
  mode?: ValidationMode;
  /** Formats registered in addition to the defaults */
  formats?: Record<string, FormatValidator>;
}

/**
 * Implementation of RecordValidator
 * Compiles each record type's descriptors once per mode and checks reference fields by their element guards
 */
export class RecordValidatorImpl implements RecordValidator {
  readonly mode: ValidationMode;
  #ajv: Record<ValidationMode, Ajv2020>;
  #compiled: Record<ValidationMode, WeakMap<object, ValidateFunction>> = {
    strict: new WeakMap(),
    lenient: new WeakMap(),
  };

  constructor(options: RecordValidatorOptions = {}) {
    this.mode = options.mode ?? "strict";
    this.#ajv = {
      strict: this.#createAjv(false),
      lenient: this.#createAjv(true),
    };
    this.registerFormats(DEFAULT_FORMATS);
    if (options.formats) {
      this.registerFormats(options.formats);
    }
  }

  #createAjv(coerce: boolean): Ajv2020 {
    const ajv = new Ajv2020({
      strict: true,
      allErrors: true,
      verbose: true,
      useDefaults: true,
      coerceTypes: coerce,
    });
    addFormats.default(ajv);
    return ajv;
  }

  /**
   * Register custom format validators
   */
  registerFormats(formats: Record<string, FormatValidator>): void {
    for (const [name, validator] of Object.entries(formats)) {
      this.#ajv.strict.addFormat(name, validator);
      this.#ajv.lenient.addFormat(name, validator);
    }
  }

  /**
   * Validate normalized fields against a record type
   */
  validate<S extends FieldSpecs>(
    type: RecordType<S>,
    fields: Record<string, unknown>,
    mode: ValidationMode = this.mode
  ): ValidationResult {
    const validator = this.#compile(type, mode);

    // Ajv sees plain data: maps are flattened, references pass through untouched
    const view: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(fields)) {
      view[name] = value instanceof HashableMap ? value.toPlain() : value;
    }

    const issues: ValidationIssue[] = [];
    if (!validator(view)) {
      issues.push(...this.#normalizeErrors(validator.errors ?? []));
    }
    issues.push(...this.#checkReferences(type, fields));

    // Keep the original containers, take scalars (possibly defaulted or coerced) from the view
    const result: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(view)) {
      const original = fields[name];
      result[name] = original !== undefined && !isScalar(original) ? original : value;
    }

    return { ok: issues.length === 0, issues, fields: result };
  }

  #compile<S extends FieldSpecs>(type: RecordType<S>, mode: ValidationMode): ValidateFunction {
    const cache = this.#compiled[mode];
    let validator = cache.get(type);
    if (!validator) {
      validator = this.#ajv[mode].compile(buildJsonSchema(type));
      cache.set(type, validator);
    }
    return validator;
  }

  /**
   * Check one-to-many and reference fields, whose values JSON Schema cannot describe
   */
  #checkReferences<S extends FieldSpecs>(type: RecordType<S>, fields: Record<string, unknown>): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const name of type.fieldNames) {
      const spec: FieldSpec | undefined = type.fields[name];
      const value = fields[name];
      if (spec === undefined || value === undefined) {
        continue;
      }

      if (spec.kind === "oneToMany") {
        if (!(value instanceof OneToMany)) {
          issues.push({
            code: "type",
            pointer: `/${name}`,
            field: name,
            message: `/${name} must be a one-to-many reference, got ${describeValue(value)}`,
          });
          continue;
        }
        value.items.forEach((item, index) => {
          if (!spec.of.is(item)) {
            issues.push({
              code: "reference",
              pointer: `/${name}/${index}`,
              field: name,
              message: `/${name}/${index} must be ${spec.of.name}, got ${describeValue(item)}`,
              context: { expected: spec.of.name },
            });
          }
        });
      } else if (spec.kind === "ref" && !spec.to.is(value)) {
        issues.push({
          code: "reference",
          pointer: `/${name}`,
          field: name,
          message: `/${name} must be ${spec.to.name}, got ${isHashable(value) ? describeValue(value) : typeof value}`,
          context: { expected: spec.to.name },
        });
      }
    }

    return issues;
  }

  /**
   * Normalize Ajv errors to ValidationIssue format
   */
  #normalizeErrors(ajvErrors: ErrorObject[]): ValidationIssue[] {
    return ajvErrors.map((err) => {
      const pointer = this.#buildPointer(err);
      return {
        code: this.#mapErrorCode(err.keyword),
        pointer,
        field: pointer.split("/")[1] ?? "",
        message: this.#formatErrorMessage(err),
        context: { keyword: err.keyword, params: err.params },
      };
    });
  }

  /**
   * Build JSON Pointer from Ajv error
   */
  #buildPointer(err: ErrorObject): string {
    const base = err.instancePath ?? "";
    const missing = param(err, "missingProperty") ?? param(err, "additionalProperty");

    // For required and additionalProperties errors, append the property name
    if (missing !== undefined) {
      return `${base}/${missing}`;
    }

    // Empty string for root, not "/"
    return base;
  }

  /**
   * Map Ajv error keyword to ValidationIssueCode
   */
  #mapErrorCode(keyword: string): ValidationIssueCode {
    switch (keyword) {
      case "required":
        return "required";
      case "type":
        return "type";
      case "enum":
        return "enum";
      case "format":
        return "format";
      case "additionalProperties":
        return "additional";
      case "pattern":
        return "pattern";
      case "minimum":
      case "exclusiveMinimum":
        return "minimum";
      case "maximum":
      case "exclusiveMaximum":
        return "maximum";
      case "minLength":
        return "minLength";
      case "maxLength":
        return "maxLength";
      default:
        return "custom";
    }
  }

  /**
   * Format error message with context
   */
  #formatErrorMessage(err: ErrorObject): string {
    const path = err.instancePath || "record";
    const limit = param(err, "limit");

    switch (err.keyword) {
      case "required":
        return `${path} is missing required field: ${param(err, "missingProperty")}`;
      case "type":
        return `${path} must be ${param(err, "type")}`;
      case "enum": {
        const allowed: unknown = err.params["allowedValues"];
        return `${path} must be one of: ${Array.isArray(allowed) ? allowed.join(", ") : String(allowed)}`;
      }
      case "format":
        return `${path} must match format "${param(err, "format")}"`;
      case "additionalProperties":
        return `${path} has undeclared field: ${param(err, "additionalProperty")}`;
      case "pattern":
        return `${path} must match pattern ${param(err, "pattern")}`;
      case "minimum":
        return `${path} must be >= ${limit}`;
      case "exclusiveMinimum":
        return `${path} must be > ${limit}`;
      case "maximum":
        return `${path} must be <= ${limit}`;
      case "exclusiveMaximum":
        return `${path} must be < ${limit}`;
      case "minLength":
        return `${path} must be at least ${limit} characters`;
      case "maxLength":
        return `${path} must be at most ${limit} characters`;
      default:
        return err.message || `Validation failed at ${path}`;
    }
  }
}

/**
 * Read a scalar Ajv error parameter as text
 */
function param(err: ErrorObject, name: string): string | undefined {
  const value: unknown = err.params[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  return String(value);
}

/**
 * Create a new record validator instance
 */
export function createRecordValidator(options?: RecordValidatorOptions): RecordValidator {
  return new RecordValidatorImpl(options);
}
