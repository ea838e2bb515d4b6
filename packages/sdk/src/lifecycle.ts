/**
 * Record lifecycle: raw mapping to stored record
 *
 * create() runs, in order: the type's prepare hook, normalization, validation,
 * instantiation and admission into the store. Every step is synchronous; a
 * failure leaves the store as it was before the call.
 */

import { RecordTypeError, RecordValidationError } from "./errors.js";
import { hasDefault, type FieldSpec, type FieldSpecs } from "./fields.js";
import { HashableMap } from "./hashable-map.js";
import { OneToMany } from "./one-to-many.js";
import { instantiate, type StoredRecord } from "./record.js";
import type { RawFields, RecordType } from "./record-type.js";
import { createRecordValidator } from "./schema/validator.js";
import { getGlobalStore, type RecordStore } from "./store.js";
import type { RecordValidator } from "./types.js";
import { describeValue, isPlainObject } from "./values.js";

export interface RecordLifecycleOptions {
  /** Store records are admitted into (default: the global store) */
  store?: RecordStore;
  /** Validator for normalized fields (default: a strict validator) */
  validator?: RecordValidator;
}

/**
 * Normalize one element of a one-to-many sequence, innermost containers first
 */
function normalizeElement(item: unknown): unknown {
  if (isPlainObject(item)) {
    return HashableMap.from(item);
  }
  if (Array.isArray(item)) {
    return OneToMany.from(item.map(normalizeElement));
  }
  return item;
}

/**
 * Normalize one raw value for its descriptor
 * Plain mappings become HashableMaps; arrays for one-to-many fields become OneToMany.
 */
function normalizeValue(spec: FieldSpec | undefined, value: unknown): unknown {
  if (isPlainObject(value)) {
    return HashableMap.from(value);
  }
  if (spec?.kind === "oneToMany" && Array.isArray(value)) {
    return OneToMany.from(value.map(normalizeElement));
  }
  return value;
}

export class RecordLifecycle {
  readonly store: RecordStore;
  readonly validator: RecordValidator;

  constructor(options: RecordLifecycleOptions = {}) {
    this.store = options.store ?? getGlobalStore();
    this.validator = options.validator ?? createRecordValidator();
  }

  /**
   * Turn raw data into candidate field values
   * Undeclared keys are dropped, unless the type forbids them (validation then rejects them).
   * @throws {RecordTypeError | RecordValueError} If a value cannot become a hashable container
   */
  normalize<S extends FieldSpecs>(type: RecordType<S>, raw: RawFields): Record<string, unknown> {
    const normalized: Record<string, unknown> = {};

    for (const [name, value] of Object.entries(raw)) {
      if (value === undefined) {
        continue;
      }
      const spec: FieldSpec | undefined = type.fields[name];
      if (spec === undefined && type.extraFields === "ignore") {
        continue;
      }
      normalized[name] = normalizeValue(spec, value);
    }

    for (const name of type.fieldNames) {
      const spec: FieldSpec | undefined = type.fields[name];
      if (spec?.kind === "map" && hasDefault(spec) && normalized[name] === undefined) {
        normalized[name] = new HashableMap();
      }
    }

    return normalized;
  }

  /**
   * Create a record from a raw mapping and save it
   * @returns The stored record (the existing one when an equal record was already stored)
   * @throws {RecordTypeError} If raw is not a mapping
   * @throws {RecordValidationError} If the fields fail validation
   * @throws {AlreadyExistsError} If an equal record exists and the type forbids duplicates
   */
  create<S extends FieldSpecs>(type: RecordType<S>, raw: unknown): StoredRecord<S> {
    if (!isPlainObject(raw)) {
      throw new RecordTypeError(`${type.name} data must be a mapping, but got ${describeValue(raw)}`);
    }

    const prepared = type.prepare ? type.prepare(raw, { store: this.store }) : raw;
    if (!isPlainObject(prepared)) {
      throw new RecordTypeError(
        `${type.name} prepare hook must return a mapping, but returned ${describeValue(prepared)}`
      );
    }

    const normalized = this.normalize(type, prepared);
    const result = this.validator.validate(type, normalized);
    if (!result.ok) {
      throw new RecordValidationError(type.name, result.issues);
    }

    const values = result.fields;
    if (!type.conforms(values)) {
      throw new RecordTypeError(`${type.name}: validated fields do not match their declared types`);
    }

    return this.store.save(instantiate(type, values));
  }

  /**
   * Create records from loaded data: one per mapping, in order
   * Stops at the first failure; records created before it stay stored.
   * @throws {RecordTypeError} If data is neither a mapping nor an array
   */
  createFromLoadedData<S extends FieldSpecs>(type: RecordType<S>, data: unknown): StoredRecord<S>[] {
    if (isPlainObject(data)) {
      return [this.create(type, data)];
    }
    if (Array.isArray(data)) {
      return data.map((item: unknown) => this.create(type, item));
    }
    throw new RecordTypeError(
      `${type.name} data must be a mapping or a list of mappings, but got ${describeValue(data)}`
    );
  }
}
