/**
 * Hashable, immutable string-keyed mapping
 *
 * Used for record fields holding nested mappings so that they can take part in
 * a record's identity hash. Insertion order is irrelevant to equality and hash.
 */

import { RecordTypeError } from "./errors.js";
import { compareCodePoints } from "./format.js";
import {
  HASHABLE,
  canonicalOf,
  canonicalTreeOf,
  describeValue,
  digest,
  isHashable,
  isPlainObject,
  toPlain,
  type Hashable,
  type HashableValue,
  type PlainValue,
} from "./values.js";

export class HashableMap implements Hashable, Iterable<[string, HashableValue]> {
  readonly [HASHABLE] = true as const;
  readonly kind = "map";
  readonly #entries: ReadonlyMap<string, HashableValue>;
  #hash: string | undefined;

  /**
   * @param entries - Key/value pairs; every value must already be hashable
   * @throws {RecordTypeError} If a value is not hashable
   */
  constructor(entries: Iterable<readonly [string, unknown]> = []) {
    const map = new Map<string, HashableValue>();
    for (const [key, value] of entries) {
      if (!isHashable(value)) {
        throw new RecordTypeError(
          `HashableMap values must be hashable, but key "${key}" holds a value of type ${describeValue(value)}`
        );
      }
      map.set(key, value);
    }
    this.#entries = map;
    Object.freeze(this);
  }

  /**
   * Convert a plain mapping, turning nested plain mappings into HashableMaps first (bottom-up)
   * @throws {RecordTypeError} If a value (at any depth) is not hashable
   */
  static from(plain: Record<string, unknown> | HashableMap): HashableMap {
    if (plain instanceof HashableMap) {
      return plain;
    }
    const entries: [string, unknown][] = [];
    for (const [key, value] of Object.entries(plain)) {
      entries.push([key, isPlainObject(value) ? HashableMap.from(value) : value]);
    }
    return new HashableMap(entries);
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: string): HashableValue | undefined {
    return this.#entries.get(key);
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  keys(): IterableIterator<string> {
    return this.#entries.keys();
  }

  values(): IterableIterator<HashableValue> {
    return this.#entries.values();
  }

  entries(): IterableIterator<[string, HashableValue]> {
    return this.#entries.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, HashableValue]> {
    return this.#entries.entries();
  }

  get hash(): string {
    this.#hash ??= digest(this.canonical());
    return this.#hash;
  }

  canonical(): string {
    return canonicalOf(this);
  }

  canonicalTree(): PlainValue {
    const tree: Record<string, PlainValue> = {};
    const keys = [...this.#entries.keys()].sort(compareCodePoints);
    for (const key of keys) {
      const value = this.#entries.get(key);
      if (value !== undefined) {
        tree[key] = canonicalTreeOf(value);
      }
    }
    return { $map: tree };
  }

  equals(other: unknown): boolean {
    return other instanceof HashableMap && other.canonical() === this.canonical();
  }

  toPlain(): { [key: string]: PlainValue } {
    const plain: { [key: string]: PlainValue } = {};
    for (const [key, value] of this.#entries) {
      plain[key] = toPlain(value);
    }
    return plain;
  }

  toJSON(): { [key: string]: PlainValue } {
    return this.toPlain();
  }
}
