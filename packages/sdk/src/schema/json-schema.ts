/**
 * Compile record type descriptors into JSON Schema (draft 2020-12)
 *
 * Scalar and map descriptors become property schemas. Reference descriptors
 * (oneToMany, ref) only contribute to `required`; their element types are
 * checked by the validator, since their values are class instances.
 */

import { hasDefault, type FieldSpec, type FieldSpecs } from "../fields.js";
import type { RecordType } from "../record-type.js";

export const JSON_SCHEMA_DRAFT = "https://json-schema.org/draft/2020-12/schema";

export type JsonSchema = { [keyword: string]: unknown };

/**
 * Copy the keywords that are set, skipping undefined ones
 */
function pick(source: object, keywords: readonly string[]): JsonSchema {
  const out: JsonSchema = {};
  for (const [keyword, value] of Object.entries(source)) {
    if (keywords.includes(keyword) && value !== undefined) {
      out[keyword] = value;
    }
  }
  return out;
}

const NUMERIC_KEYWORDS = [
  "minimum",
  "maximum",
  "exclusiveMinimum",
  "exclusiveMaximum",
  "enum",
  "default",
  "description",
] as const;

/**
 * JSON Schema for a single field
 */
export function fieldSchema(spec: FieldSpec): JsonSchema {
  switch (spec.kind) {
    case "string":
      return {
        type: "string",
        ...pick(spec, ["format", "pattern", "minLength", "maxLength", "enum", "default", "description"]),
      };
    case "integer":
      return { type: "integer", ...pick(spec, NUMERIC_KEYWORDS) };
    case "number":
      return { type: "number", ...pick(spec, NUMERIC_KEYWORDS) };
    case "boolean":
      return { type: "boolean", ...pick(spec, ["default", "description"]) };
    case "map":
      return { type: "object", ...pick(spec, ["description"]) };
    case "oneToMany":
    case "ref":
      return pick(spec, ["description"]);
  }
}

/**
 * JSON Schema for a record type's normalized fields
 */
export function buildJsonSchema<S extends FieldSpecs>(type: RecordType<S>): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const name of type.fieldNames) {
    const spec: FieldSpec | undefined = type.fields[name];
    if (spec === undefined) {
      continue;
    }
    properties[name] = fieldSchema(spec);
    if (!hasDefault(spec)) {
      required.push(name);
    }
  }

  return {
    $schema: JSON_SCHEMA_DRAFT,
    title: type.name,
    type: "object",
    properties,
    required,
    additionalProperties: type.extraFields !== "forbid",
  };
}
