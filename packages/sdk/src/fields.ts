/**
 * Field descriptors: the per-field schema a record type is declared with
 *
 * Descriptors are plain data. The validator compiles scalar and map
 * descriptors to JSON Schema and checks reference descriptors itself.
 *
 * @example
 * ```typescript
 * const fields = {
 *   email: field.string({ format: "email" }),
 *   age: field.integer({ minimum: 18, maximum: 100 }),
 *   interests: field.oneToMany(ProductType),
 * };
 * ```
 */

import { HashableMap } from "./hashable-map.js";
import { OneToMany } from "./one-to-many.js";
import type { HashableValue, Scalar } from "./values.js";

/**
 * Runtime check for the elements of a one-to-many or the target of a reference
 */
export interface ElementGuard<T extends HashableValue> {
  /** Name used in validation messages */
  readonly name: string;
  is(value: unknown): value is T;
}

interface FieldBase<K extends string> {
  readonly kind: K;
  readonly description?: string;
}

export interface StringField extends FieldBase<"string"> {
  readonly format?: string;
  readonly pattern?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly enum?: readonly string[];
  readonly default?: string;
}

export interface NumericField<K extends "integer" | "number"> extends FieldBase<K> {
  readonly minimum?: number;
  readonly maximum?: number;
  readonly exclusiveMinimum?: number;
  readonly exclusiveMaximum?: number;
  readonly enum?: readonly number[];
  readonly default?: number;
}

export type IntegerField = NumericField<"integer">;
export type NumberField = NumericField<"number">;

export interface BooleanField extends FieldBase<"boolean"> {
  readonly default?: boolean;
}

export interface MapField extends FieldBase<"map"> {
  /** When true, an omitted value becomes an empty map */
  readonly default?: boolean;
}

export interface OneToManyField<T extends HashableValue> extends FieldBase<"oneToMany"> {
  readonly of: ElementGuard<T>;
}

export interface ReferenceField<T extends HashableValue> extends FieldBase<"ref"> {
  readonly to: ElementGuard<T>;
}

export type FieldSpec =
  | StringField
  | IntegerField
  | NumberField
  | BooleanField
  | MapField
  | OneToManyField<HashableValue>
  | ReferenceField<HashableValue>;

export type FieldSpecs = Record<string, FieldSpec>;

/**
 * Value type held by a field with descriptor F
 */
export type ValueOf<F> = F extends StringField
  ? string
  : F extends IntegerField | NumberField
    ? number
    : F extends BooleanField
      ? boolean
      : F extends MapField
        ? HashableMap
        : F extends OneToManyField<infer T extends HashableValue>
          ? OneToMany<T>
          : F extends ReferenceField<infer T extends HashableValue>
            ? T
            : never;

/**
 * Field values of a record whose type declares descriptors S
 */
export type FieldValues<S extends FieldSpecs> = { readonly [K in keyof S]: ValueOf<S[K]> };

type Options<F> = Omit<F, "kind">;

/**
 * Descriptor builders
 */
export const field = {
  string(options: Options<StringField> = {}): StringField {
    return { kind: "string", ...options };
  },
  integer(options: Options<IntegerField> = {}): IntegerField {
    return { kind: "integer", ...options };
  },
  number(options: Options<NumberField> = {}): NumberField {
    return { kind: "number", ...options };
  },
  boolean(options: Options<BooleanField> = {}): BooleanField {
    return { kind: "boolean", ...options };
  },
  map(options: Options<MapField> = {}): MapField {
    return { kind: "map", ...options };
  },
  oneToMany<T extends HashableValue>(
    of: ElementGuard<T>,
    options: Omit<Options<OneToManyField<T>>, "of"> = {}
  ): OneToManyField<T> {
    return { kind: "oneToMany", of, ...options };
  },
  ref<T extends HashableValue>(
    to: ElementGuard<T>,
    options: Omit<Options<ReferenceField<T>>, "to"> = {}
  ): ReferenceField<T> {
    return { kind: "ref", to, ...options };
  },
};

function scalarGuard<T extends Scalar>(name: string, test: (value: unknown) => boolean): ElementGuard<T> {
  return {
    name,
    is: (value: unknown): value is T => test(value),
  };
}

/**
 * Guards for one-to-many fields whose elements are not records
 */
export const elements = {
  string: scalarGuard<string>("string", (v) => typeof v === "string"),
  integer: scalarGuard<number>("integer", (v) => typeof v === "number" && Number.isInteger(v)),
  number: scalarGuard<number>("number", (v) => typeof v === "number"),
  boolean: scalarGuard<boolean>("boolean", (v) => typeof v === "boolean"),
  map: {
    name: "map",
    is: (value: unknown): value is HashableMap => value instanceof HashableMap,
  } satisfies ElementGuard<HashableMap>,
};

/**
 * Structural check of a normalized value against its descriptor
 */
export function conformsTo(spec: FieldSpec, value: unknown): boolean {
  switch (spec.kind) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
    case "map":
      return value instanceof HashableMap;
    case "oneToMany":
      return value instanceof OneToMany && value.items.every((item) => spec.of.is(item));
    case "ref":
      return spec.to.is(value);
  }
}

/**
 * Whether raw data may omit the field
 */
export function hasDefault(spec: FieldSpec): boolean {
  switch (spec.kind) {
    case "map":
      return spec.default === true;
    case "oneToMany":
    case "ref":
      return false;
    default:
      return spec.default !== undefined;
  }
}
