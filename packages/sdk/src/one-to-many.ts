/**
 * One-to-many reference container
 *
 * Maps a relationship between one record and N values (usually records) of a
 * single kind. Construction enforces, in order:
 *   1. the input is a sequence (array)
 *   2. the sequence is not empty
 *   3. all elements are of the same kind
 *   4. each element is hashable
 */

import { RecordTypeError, RecordValueError } from "./errors.js";
import { stableStringify } from "./format.js";
import {
  HASHABLE,
  canonicalTreeOf,
  describeValue,
  digest,
  isHashable,
  kindOf,
  toPlain,
  valuesEqual,
  type Hashable,
  type HashableValue,
  type PlainValue,
} from "./values.js";

export class OneToMany<T extends HashableValue = HashableValue> implements Hashable, Iterable<T> {
  readonly [HASHABLE] = true as const;
  readonly kind = "one-to-many";
  readonly items: readonly T[];
  #hash: string | undefined;

  /**
   * @throws {RecordTypeError} If items is not an array, is heterogeneous, or holds an unhashable element
   * @throws {RecordValueError} If items is empty
   */
  constructor(items: readonly T[]) {
    const input: unknown = items;
    if (!Array.isArray(input)) {
      throw new RecordTypeError(
        `The OneToMany initialization value must be a sequence, but got ${describeValue(input)}`
      );
    }
    if (input.length === 0) {
      throw new RecordValueError("The OneToMany initialization sequence can't be empty");
    }

    const firstKind = kindOf(input[0]);
    if (!input.every((item) => kindOf(item) === firstKind)) {
      throw new RecordTypeError(
        "All elements of a OneToMany initialization sequence must be of the same type"
      );
    }

    for (const item of input) {
      if (!isHashable(item)) {
        throw new RecordTypeError(
          `Each element in the OneToMany initialization sequence must be hashable, but a ${describeValue(item)} isn't`
        );
      }
    }

    this.items = Object.freeze([...items]);
    Object.freeze(this);
  }

  /**
   * Build a reference from an unchecked value
   * @throws {RecordTypeError | RecordValueError} As the constructor
   */
  static from(value: unknown): OneToMany {
    if (value instanceof OneToMany) {
      return value;
    }
    if (!Array.isArray(value)) {
      throw new RecordTypeError(
        `The OneToMany initialization value must be a sequence, but got ${describeValue(value)}`
      );
    }
    const items: HashableValue[] = [];
    for (const item of value) {
      if (!isHashable(item)) {
        throw new RecordTypeError(
          `Each element in the OneToMany initialization sequence must be hashable, but a ${describeValue(item)} isn't`
        );
      }
      items.push(item);
    }
    return new OneToMany(items);
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Element kind shared by all items
   */
  get elementKind(): string {
    return kindOf(this.items[0]) ?? "unknown";
  }

  at(index: number): T | undefined {
    return this.items.at(index);
  }

  includes(value: HashableValue): boolean {
    return this.items.some((item) => valuesEqual(item, value));
  }

  map<U>(fn: (item: T, index: number) => U): U[] {
    return this.items.map(fn);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  get hash(): string {
    this.#hash ??= digest(this.canonical());
    return this.#hash;
  }

  canonical(): string {
    return stableStringify(this.canonicalTree(), 0, "alpha");
  }

  canonicalTree(): PlainValue {
    return { $many: this.items.map((item) => canonicalTreeOf(item)) };
  }

  equals(other: unknown): boolean {
    return other instanceof OneToMany && other.canonical() === this.canonical();
  }

  toPlain(): PlainValue[] {
    return this.items.map((item) => toPlain(item));
  }

  toJSON(): PlainValue[] {
    return this.toPlain();
  }
}
