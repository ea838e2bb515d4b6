/**
 * Sorted, duplicate-aware collection of one record type's records
 *
 * Records stay ordered by key; records with equal keys keep insertion order.
 * Duplicates are found through a hash bucket, then confirmed by canonical equality.
 */

import { compareKeys } from "./query.js";
import type { StoredRecord } from "./record.js";

export class SortedRecordSet implements Iterable<StoredRecord> {
  #items: StoredRecord[] = [];
  #byHash = new Map<string, StoredRecord[]>();

  get size(): number {
    return this.#items.length;
  }

  /**
   * The stored record equal to the given one, if any
   */
  find(record: StoredRecord): StoredRecord | undefined {
    return this.#byHash.get(record.hash)?.find((candidate) => candidate.equals(record));
  }

  has(record: StoredRecord): boolean {
    return this.find(record) !== undefined;
  }

  /**
   * Insert a record in key order
   * @returns false if an equal record is already present (nothing is inserted)
   */
  add(record: StoredRecord): boolean {
    if (this.has(record)) {
      return false;
    }

    this.#items.splice(this.#upperBound(record), 0, record);

    const bucket = this.#byHash.get(record.hash);
    if (bucket) {
      bucket.push(record);
    } else {
      this.#byHash.set(record.hash, [record]);
    }
    return true;
  }

  /**
   * First position whose key is greater than the record's key
   */
  #upperBound(record: StoredRecord): number {
    let low = 0;
    let high = this.#items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const current = this.#items[mid];
      if (current !== undefined && compareKeys(current.key, record.key) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  /**
   * Frozen snapshot in key order
   */
  toArray(): readonly StoredRecord[] {
    return Object.freeze([...this.#items]);
  }

  [Symbol.iterator](): Iterator<StoredRecord> {
    return this.#items[Symbol.iterator]();
  }
}
