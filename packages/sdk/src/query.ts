/**
 * Record matching and key ordering
 */

import { RecordTypeError } from "./errors.js";
import { compareCodePoints } from "./format.js";
import { HashableMap } from "./hashable-map.js";
import { OneToMany } from "./one-to-many.js";
import type { FieldSpecs } from "./fields.js";
import type { StoredRecord } from "./record.js";
import type { RecordType } from "./record-type.js";
import { canonicalOf, isHashable, isPlainObject, valuesEqual, type HashableValue } from "./values.js";

/**
 * Exact-match predicate: every named field must equal the given value
 */
export type Where<S extends FieldSpecs = FieldSpecs> = { readonly [K in keyof S & string]?: unknown };

/**
 * Turn a predicate value into a hashable value comparable with field values
 * @returns undefined when the value cannot equal any field value
 */
function toComparable(expected: unknown): HashableValue | undefined {
  if (isHashable(expected)) {
    return expected;
  }
  if (isPlainObject(expected)) {
    return HashableMap.from(expected);
  }
  if (Array.isArray(expected) && expected.length > 0) {
    return OneToMany.from(expected);
  }
  return undefined;
}

/**
 * @throws {RecordTypeError} If the predicate names a field the record type does not declare
 */
export function assertWhereFields<S extends FieldSpecs>(type: RecordType<S>, where: Where<S>): void {
  for (const name of Object.keys(where)) {
    if (!type.fieldNames.includes(name)) {
      throw new RecordTypeError(`${type.name} has no field "${name}"`);
    }
  }
}

/**
 * Test if a record matches a predicate
 * @param record - Record to test
 * @param where - Field/value pairs, all of which must match (empty matches everything)
 * @throws {RecordTypeError} If the predicate names a field the record type does not declare
 */
export function matchesWhere<S extends FieldSpecs>(record: StoredRecord<S>, where: Where<S> = {}): boolean {
  assertWhereFields(record.type, where);
  for (const [name, expected] of Object.entries(where)) {
    const comparable = toComparable(expected);
    if (comparable === undefined || !valuesEqual(record.field(name), comparable)) {
      return false;
    }
  }
  return true;
}

/**
 * Type precedence for mixed-kind key components: null < boolean < number < string < other
 */
function rank(value: HashableValue): number {
  if (value === null) return 0;
  switch (typeof value) {
    case "boolean":
      return 1;
    case "number":
      return 2;
    case "string":
      return 3;
    default:
      return 4;
  }
}

/**
 * Compare two key components
 * @returns Negative, zero or positive
 */
export function compareValues(a: HashableValue, b: HashableValue): number {
  const rankA = rank(a);
  const rankB = rank(b);
  if (rankA !== rankB) {
    return rankA - rankB;
  }

  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return compareCodePoints(a, b);
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (a === null && b === null) {
    return 0;
  }

  // Containers and records compare by canonical form
  return compareCodePoints(canonicalOf(a), canonicalOf(b));
}

/**
 * Compare two record keys element-wise, in key field order
 * @returns Negative, zero or positive
 */
export function compareKeys(a: readonly HashableValue[], b: readonly HashableValue[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) {
      break;
    }
    const cmp = compareValues(left, right);
    if (cmp !== 0) {
      return cmp;
    }
  }
  return a.length - b.length;
}
