/**
 * Record store implementation
 */

import { SortedRecordSet } from "./collection.js";
import {
  AlreadyExistsError,
  DirectAssignmentError,
  DoesNotExistError,
  MultipleReturnedError,
} from "./errors.js";
import type { FieldSpecs } from "./fields.js";
import { assertWhereFields, matchesWhere, type Where } from "./query.js";
import type { StoredRecord } from "./record.js";
import type { RecordType } from "./record-type.js";
import type { PlainValue } from "./values.js";

/**
 * Plain snapshot of a store: type name to plain field mappings, in store order
 */
export type StoreExport = Record<string, Array<{ [field: string]: PlainValue }>>;

/**
 * Type-partitioned, sorted, in-memory record store
 *
 * Each record type's records are kept ascending by key. Saving a record equal
 * in every field to one already stored is a no-op, or an AlreadyExistsError
 * when the type forbids duplicates.
 *
 * @example
 * ```typescript
 * const store = new RecordStore();
 * lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
 *
 * const tools = store.filter(ProductType, { category: "tools" });
 * const widget = store.get(ProductType, { prod_id: "P1" });
 * ```
 */
export class RecordStore {
  #collections = new Map<string, SortedRecordSet>();

  /**
   * Read-only view of every collection, by type name
   */
  get records(): ReadonlyMap<string, readonly StoredRecord[]> {
    const view = new Map<string, readonly StoredRecord[]>();
    for (const [name, collection] of this.#collections) {
      view.set(name, collection.toArray());
    }
    return view;
  }

  /**
   * @throws {DirectAssignmentError} Always; collections change only through save()
   */
  set records(_value: unknown) {
    throw new DirectAssignmentError(
      "Direct assignment to the store's records is not allowed; save records through the store instead"
    );
  }

  #collection(typeName: string): SortedRecordSet {
    let collection = this.#collections.get(typeName);
    if (!collection) {
      collection = new SortedRecordSet();
      this.#collections.set(typeName, collection);
    }
    return collection;
  }

  /**
   * Insert a record into its type's collection
   * @returns The record, or the equal record already stored
   * @throws {AlreadyExistsError} If an equal record exists and the type forbids duplicates
   */
  save<S extends FieldSpecs>(record: StoredRecord<S>): StoredRecord<S> {
    const { type } = record;
    const collection = this.#collection(type.name);

    const existing = collection.find(record);
    if (existing) {
      if (type.errorOnDuplicate) {
        throw new AlreadyExistsError(type.name, type.keyFields, record.key);
      }
      return type.is(existing) ? existing : record;
    }

    collection.add(record);
    return record;
  }

  /**
   * Records of a type matching every field/value pair, sorted by key
   * @throws {RecordTypeError} If the predicate names an undeclared field
   */
  filter<S extends FieldSpecs>(type: RecordType<S>, where: Where<S> = {}): readonly StoredRecord<S>[] {
    assertWhereFields(type, where);
    const results: StoredRecord<S>[] = [];
    for (const record of this.#collections.get(type.name) ?? []) {
      if (type.is(record) && matchesWhere(record, where)) {
        results.push(record);
      }
    }
    return Object.freeze(results);
  }

  /**
   * The single record of a type matching the predicate
   * @throws {DoesNotExistError} If nothing matches
   * @throws {MultipleReturnedError} If more than one record matches
   */
  get<S extends FieldSpecs>(type: RecordType<S>, where: Where<S>): StoredRecord<S> {
    const results = this.filter(type, where);
    const [first] = results;
    if (first === undefined) {
      throw new DoesNotExistError(type.name, where);
    }
    if (results.length > 1) {
      throw new MultipleReturnedError(type.name, results.length, where);
    }
    return first;
  }

  /**
   * Every record of a type, sorted by key
   */
  getAll<S extends FieldSpecs>(type: RecordType<S>): readonly StoredRecord<S>[] {
    return this.filter(type);
  }

  /**
   * Whether an equal record is stored
   */
  has<S extends FieldSpecs>(record: StoredRecord<S>): boolean {
    return this.#collections.get(record.type.name)?.has(record) ?? false;
  }

  /**
   * Number of records of one type, or of all types
   */
  count<S extends FieldSpecs>(type?: RecordType<S>): number {
    if (type) {
      return this.#collections.get(type.name)?.size ?? 0;
    }
    let total = 0;
    for (const collection of this.#collections.values()) {
      total += collection.size;
    }
    return total;
  }

  /**
   * Names of the types with a collection, in creation order
   */
  typeNames(): string[] {
    return [...this.#collections.keys()];
  }

  /**
   * Plain nested snapshot: type name to plain field mappings, in store order
   */
  export(): StoreExport {
    const out: StoreExport = {};
    for (const [name, collection] of this.#collections) {
      out[name] = Array.from(collection, (record) => record.toPlain());
    }
    return out;
  }
}

let globalStore: RecordStore | undefined;

/**
 * Process-wide default store, created on first use
 */
export function getGlobalStore(): RecordStore {
  globalStore ??= new RecordStore();
  return globalStore;
}
