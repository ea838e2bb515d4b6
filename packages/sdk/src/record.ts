/**
 * Record instances
 *
 * Invariants:
 * - Immutable after construction
 * - Created only by RecordLifecycle; direct construction throws InitializationError
 * - `key` orders records; `hash` plus canonical equality identifies duplicates
 */

import { InitializationError } from "./errors.js";
import { stableStringify } from "./format.js";
import type { FieldSpecs, FieldValues } from "./fields.js";
import type { RecordType } from "./record-type.js";
import {
  HASHABLE,
  canonicalOf,
  canonicalTreeOf,
  digest,
  isHashable,
  toPlain,
  type Hashable,
  type HashableValue,
  type PlainValue,
} from "./values.js";

const CONSTRUCT: unique symbol = Symbol("recordkit.record.construct");

export class StoredRecord<S extends FieldSpecs = FieldSpecs> implements Hashable {
  readonly [HASHABLE] = true as const;
  readonly type: RecordType<S>;
  readonly values: FieldValues<S>;
  /** Values of the type's key fields, in key order */
  readonly key: readonly HashableValue[];
  readonly #fields: ReadonlyMap<string, HashableValue>;
  #canonical: string | undefined;
  #hash: string | undefined;

  /**
   * @throws {InitializationError} Always, unless called by the record lifecycle
   */
  constructor(token: symbol, type: RecordType<S>, values: FieldValues<S>) {
    if (token !== CONSTRUCT) {
      throw new InitializationError(
        "Cannot instantiate StoredRecord directly; create records through RecordLifecycle.create()"
      );
    }

    const fields = new Map<string, HashableValue>();
    for (const [name, value] of Object.entries(values)) {
      if (isHashable(value)) {
        fields.set(name, value);
      }
    }
    for (const name of type.fieldNames) {
      if (!fields.has(name)) {
        throw new InitializationError(`${type.name}: field "${name}" has no hashable value`);
      }
    }

    this.type = type;
    this.values = Object.freeze({ ...values });
    this.#fields = fields;
    this.key = Object.freeze(type.keyFields.map((name) => this.field(name)));
    Object.freeze(this);
  }

  get kind(): string {
    return `record:${this.type.name}`;
  }

  /**
   * Value of a declared field
   * @throws {InitializationError} If the type declares no such field
   */
  field(name: string): HashableValue {
    const value = this.#fields.get(name);
    if (value === undefined) {
      throw new InitializationError(`${this.type.name} has no field "${name}"`);
    }
    return value;
  }

  /**
   * Identity hash over the type name and all field values in declaration order
   */
  get hash(): string {
    this.#hash ??= digest(this.canonical());
    return this.#hash;
  }

  canonical(): string {
    this.#canonical ??= stableStringify(this.canonicalTree(), 0, "alpha");
    return this.#canonical;
  }

  canonicalTree(): PlainValue {
    return {
      $record: this.type.name,
      fields: this.type.fieldNames.map((name) => [name, canonicalTreeOf(this.field(name))]),
    };
  }

  equals(other: unknown): boolean {
    return other instanceof StoredRecord && other.canonical() === this.canonical();
  }

  /**
   * Field mapping with plain values, in declaration order
   */
  toPlain(): { [key: string]: PlainValue } {
    const plain: { [key: string]: PlainValue } = {};
    for (const name of this.type.fieldNames) {
      plain[name] = toPlain(this.field(name));
    }
    return plain;
  }

  toJSON(): { [key: string]: PlainValue } {
    return this.toPlain();
  }

  toString(): string {
    const parts = this.type.fieldNames.map((name) => `${name}=${canonicalOf(this.field(name))}`);
    return `${this.type.name}(${parts.join(", ")})`;
  }
}

/**
 * Construct a record from values the lifecycle has already normalized and validated
 * @internal
 */
export function instantiate<S extends FieldSpecs>(type: RecordType<S>, values: FieldValues<S>): StoredRecord<S> {
  return new StoredRecord(CONSTRUCT, type, values);
}
