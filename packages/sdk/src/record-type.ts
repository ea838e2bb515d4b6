/**
 * Record type declarations
 *
 * A record type is declared once, as data: its fields, the fields forming its
 * sort key, the directive that binds ingested data to it, and its duplicate
 * policy.
 *
 * @example
 * ```typescript
 * const ProductType = defineRecordType({
 *   name: "ProductModel",
 *   directive: "products",
 *   keyFields: ["prod_id"],
 *   errorOnDuplicate: true,
 *   fields: {
 *     prod_id: field.string(),
 *     name: field.string(),
 *     category: field.string(),
 *   },
 * });
 * ```
 */

import { InitializationError } from "./errors.js";
import { conformsTo, type ElementGuard, type FieldSpecs, type FieldValues } from "./fields.js";
import { StoredRecord } from "./record.js";
import type { RecordStore } from "./store.js";

/**
 * Raw field data, as loaded from a file
 */
export type RawFields = Record<string, unknown>;

/**
 * What a record type does with undeclared keys in raw data
 */
export type ExtraFieldsPolicy = "ignore" | "forbid";

/**
 * Context handed to a record type's prepare hook
 */
export interface PrepareContext {
  /** Store the record is about to be saved into */
  store: RecordStore;
}

/**
 * Pre-create hook: rewrites raw data before normalization, e.g. to resolve
 * references to records that already exist in the store
 */
export type PrepareHook = (raw: RawFields, context: PrepareContext) => RawFields;

export interface RecordTypeOptions<S extends FieldSpecs> {
  /** Unique type name; the store partitions records by it */
  name: string;
  /** Mapping key that binds ingested data to this type */
  directive?: string;
  /** Fields whose values form the record key, in comparison order */
  keyFields: readonly (keyof S & string)[];
  /** Throw AlreadyExistsError when an identical record is saved twice (default: false) */
  errorOnDuplicate?: boolean;
  /** Undeclared keys in raw data: dropped or rejected (default: "ignore") */
  extraFields?: ExtraFieldsPolicy;
  fields: S;
  prepare?: PrepareHook;
  /** Template name for rendering (default: derived from the type name) */
  template?: string;
  description?: string;
}

export interface RecordType<S extends FieldSpecs = FieldSpecs> extends ElementGuard<StoredRecord<S>> {
  readonly name: string;
  readonly directive: string | undefined;
  readonly keyFields: readonly (keyof S & string)[];
  readonly errorOnDuplicate: boolean;
  readonly extraFields: ExtraFieldsPolicy;
  readonly fields: Readonly<S>;
  /** Declared field names, in declaration order */
  readonly fieldNames: readonly string[];
  readonly prepare: PrepareHook | undefined;
  readonly template: string;
  readonly description: string | undefined;
  /**
   * Narrow normalized values to this type's field values
   */
  conforms(values: Record<string, unknown>): values is FieldValues<S>;
}

const VALID_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * Derive a template name from a type name: split on capitals, drop "Model", join with "_"
 * @example templateNameFor("OtherClassModel") === "other_class"
 */
export function templateNameFor(typeName: string): string {
  const parts = typeName.match(/[A-Z][^A-Z]*/g);
  if (!parts) {
    return typeName.toLowerCase();
  }
  const modelIndex = parts.indexOf("Model");
  if (modelIndex !== -1) {
    parts.splice(modelIndex, 1);
  }
  return parts.join("_").toLowerCase();
}

/**
 * Declare a record type
 * @throws {InitializationError} If the name, key fields or directive are invalid
 */
export function defineRecordType<S extends FieldSpecs>(options: RecordTypeOptions<S>): RecordType<S> {
  const { name, directive, keyFields, fields } = options;

  if (!name || !VALID_NAME_PATTERN.test(name)) {
    throw new InitializationError(
      `Record type name "${name}" is invalid. Names start with a letter or underscore and contain only letters, digits, "_", "." and "-".`
    );
  }

  const fieldNames = Object.keys(fields);
  if (fieldNames.length === 0) {
    throw new InitializationError(`Record type ${name} must declare at least one field`);
  }

  if (keyFields.length === 0) {
    throw new InitializationError(`Record type ${name} must declare at least one key field`);
  }
  for (const keyField of keyFields) {
    if (!fieldNames.includes(keyField)) {
      throw new InitializationError(`Record type ${name}: key field "${keyField}" is not a declared field`);
    }
  }
  if (new Set(keyFields).size !== keyFields.length) {
    throw new InitializationError(`Record type ${name}: key fields must not repeat`);
  }

  if (directive !== undefined && directive.trim() === "") {
    throw new InitializationError(`Record type ${name}: directive must be a non-empty string when set`);
  }

  const type: RecordType<S> = Object.freeze({
    name,
    directive,
    keyFields: Object.freeze([...keyFields]),
    errorOnDuplicate: options.errorOnDuplicate ?? false,
    extraFields: options.extraFields ?? "ignore",
    fields: Object.freeze({ ...fields }),
    fieldNames: Object.freeze(fieldNames),
    prepare: options.prepare,
    template: options.template ?? templateNameFor(name),
    description: options.description,
    is(value: unknown): value is StoredRecord<S> {
      return value instanceof StoredRecord && value.type === type;
    },
    conforms(values: Record<string, unknown>): values is FieldValues<S> {
      return fieldNames.every((fieldName) => {
        const spec = fields[fieldName];
        return spec !== undefined && conformsTo(spec, values[fieldName]);
      });
    },
  });

  return type;
}

/**
 * Test whether a value (e.g. a module export) is a declared record type
 */
export function isRecordType(value: unknown): value is RecordType {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    "keyFields" in value &&
    "fields" in value &&
    "conforms" in value &&
    "is" in value &&
    typeof value.is === "function" &&
    typeof value.conforms === "function"
  );
}
