/**
 * The closed set of values a record field can hold, and their canonical forms
 *
 * Invariants:
 * - Every hashable value has exactly one canonical form; structural equality is canonical equality
 * - Canonical forms of different kinds never collide (containers are tagged)
 * - Map keys are canonicalized in code point order, so insertion order is irrelevant
 */

import { createHash } from "node:crypto";
import { stableStringify } from "./format.js";
import type { HashableMap } from "./hashable-map.js";
import type { OneToMany } from "./one-to-many.js";
import type { StoredRecord } from "./record.js";

export type Scalar = string | number | boolean | null;

/**
 * Any value a record field may hold
 */
export type HashableValue = Scalar | HashableMap | OneToMany<HashableValue> | StoredRecord;

/**
 * Plain JSON-like data, as produced by codecs and by toPlain()
 */
export type PlainValue = Scalar | PlainValue[] | { [key: string]: PlainValue };

/**
 * Brand carried by the hashable container classes
 */
export const HASHABLE: unique symbol = Symbol("recordkit.hashable");

/**
 * Contract shared by HashableMap, OneToMany and StoredRecord
 */
export interface Hashable {
  readonly [HASHABLE]: true;
  /** Element kind: "map", "one-to-many" or "record:<TypeName>" */
  readonly kind: string;
  /** Hex SHA-256 digest of the canonical form */
  readonly hash: string;
  canonical(): string;
  canonicalTree(): PlainValue;
  equals(other: unknown): boolean;
  toPlain(): PlainValue;
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function isHashableObject(value: unknown): value is Hashable {
  return typeof value === "object" && value !== null && HASHABLE in value;
}

/**
 * Test whether a value belongs to the hashable value union
 */
export function isHashable(value: unknown): value is HashableValue {
  return isScalar(value) || isHashableObject(value);
}

/**
 * Test for a plain mapping (object literal or null-prototype object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Element kind used to check one-to-many homogeneity
 * @returns Kind name, or undefined when the value is not hashable
 */
export function kindOf(value: unknown): string | undefined {
  if (value === null) return "null";
  if (isScalar(value)) return typeof value;
  if (isHashableObject(value)) return value.kind;
  return undefined;
}

/**
 * Human-readable type name for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (isHashableObject(value)) return value.kind;
  if (typeof value === "object") {
    return isPlainObject(value) ? "object" : value.constructor.name;
  }
  return typeof value;
}

/**
 * Canonical tree of a value: scalars as-is, containers tagged
 */
export function canonicalTreeOf(value: HashableValue): PlainValue {
  if (typeof value === "number" && !Number.isFinite(value)) {
    return { $number: String(value) };
  }
  if (isScalar(value)) {
    return value;
  }
  return value.canonicalTree();
}

/**
 * Canonical string of a value
 */
export function canonicalOf(value: HashableValue): string {
  return stableStringify(canonicalTreeOf(value), 0, "alpha");
}

/**
 * Structural equality: same canonical form
 */
export function valuesEqual(a: HashableValue, b: HashableValue): boolean {
  if (a === b) {
    return true;
  }
  if (isScalar(a) && isScalar(b)) {
    // Distinct scalars are only equal when both are NaN
    return typeof a === "number" && typeof b === "number" && Number.isNaN(a) && Number.isNaN(b);
  }
  if (isScalar(a) || isScalar(b)) {
    return false;
  }
  return a.equals(b);
}

/**
 * Convert a hashable value into plain data
 */
export function toPlain(value: HashableValue): PlainValue {
  return isScalar(value) ? value : value.toPlain();
}

/**
 * Hex SHA-256 digest of a canonical string
 */
export function digest(canonical: string): string {
  return createHash("sha256").update(canonical).digest("hex");
}
