import { describe, it, expect } from "vitest";
import { CustomerType, ProductType } from "@recordkit/testkit";
import { field } from "../fields.js";
import { HashableMap } from "../hashable-map.js";
import { defineRecordType } from "../record-type.js";
import { buildJsonSchema, JSON_SCHEMA_DRAFT } from "./json-schema.js";
import { createRecordValidator } from "./validator.js";

const CounterType = defineRecordType({
  name: "CounterModel",
  keyFields: ["id"],
  fields: {
    id: field.string({ format: "slug" }),
    count: field.integer({ default: 0 }),
    kind: field.string({ enum: ["up", "down"], default: "up" }),
  },
});

describe("buildJsonSchema", () => {
  it("should describe scalar fields and require those without defaults", () => {
    expect(buildJsonSchema(ProductType)).toEqual({
      $schema: JSON_SCHEMA_DRAFT,
      title: "ProductModel",
      type: "object",
      properties: {
        prod_id: { type: "string" },
        name: { type: "string" },
        category: { type: "string" },
      },
      required: ["prod_id", "name", "category"],
      additionalProperties: true,
    });
  });

  it("should carry constraints and leave references to the validator", () => {
    const schema = buildJsonSchema(CustomerType);

    expect(schema["properties"]).toEqual({
      name: { type: "string" },
      age: { type: "integer", minimum: 18, maximum: 100 },
      send_ads: { type: "boolean", default: false },
      email: { type: "string", format: "email" },
      flagged_interests: {},
    });
    expect(schema["required"]).toEqual(["name", "age", "email", "flagged_interests"]);
  });

  it("should close the schema when extra fields are forbidden", () => {
    const NoteType = defineRecordType({
      name: "NoteModel",
      keyFields: ["id"],
      extraFields: "forbid",
      fields: { id: field.string(), meta: field.map({ description: "Free-form metadata" }) },
    });
    const schema = buildJsonSchema(NoteType);

    expect(schema["additionalProperties"]).toBe(false);
    expect(schema["properties"]).toEqual({
      id: { type: "string" },
      meta: { type: "object", description: "Free-form metadata" },
    });
  });
});

describe("RecordValidator", () => {
  it("should pass valid fields and apply defaults", () => {
    const validator = createRecordValidator();
    const result = validator.validate(CounterType, { id: "hits" });

    expect(result).toEqual({ ok: true, issues: [], fields: { id: "hits", count: 0, kind: "up" } });
  });

  it("should check the built-in slug format", () => {
    const result = createRecordValidator().validate(CounterType, { id: "Hits Total" });

    expect(result.ok).toBe(false);
    expect(result.issues).toEqual([
      {
        code: "format",
        pointer: "/id",
        field: "id",
        message: '/id must match format "slug"',
        context: { keyword: "format", params: { format: "slug" } },
      },
    ]);
  });

  it("should report enum values", () => {
    const result = createRecordValidator().validate(CounterType, { id: "hits", kind: "sideways" });
    expect(result.issues[0]?.message).toBe("/kind must be one of: up, down");
  });

  it("should let the caller override the mode", () => {
    const validator = createRecordValidator();

    expect(validator.mode).toBe("strict");
    expect(validator.validate(CounterType, { id: "hits", count: "7" }).ok).toBe(false);
    expect(validator.validate(CounterType, { id: "hits", count: "7" }, "lenient").fields["count"]).toBe(7);
  });

  it("should accept registered formats", () => {
    const validator = createRecordValidator({ formats: { upper: (value) => value === value.toUpperCase() } });
    const CodeType = defineRecordType({
      name: "CodeModel",
      keyFields: ["code"],
      fields: { code: field.string({ format: "upper" }) },
    });

    expect(validator.validate(CodeType, { code: "ABC" }).ok).toBe(true);
    expect(validator.validate(CodeType, { code: "abc" }).issues[0]?.message).toBe('/code must match format "upper"');
  });

  it("should keep map fields as HashableMaps", () => {
    const ServerType = defineRecordType({
      name: "ServerModel",
      keyFields: ["host"],
      fields: { host: field.string(), options: field.map() },
    });
    const options = HashableMap.from({ tls: true });
    const result = createRecordValidator().validate(ServerType, { host: "db", options });

    expect(result.ok).toBe(true);
    expect(result.fields["options"]).toBe(options);
  });

  it("should report a map field holding a scalar", () => {
    const ServerType = defineRecordType({
      name: "ServerModel",
      keyFields: ["host"],
      fields: { host: field.string(), options: field.map() },
    });
    const result = createRecordValidator().validate(ServerType, { host: "db", options: 3 });

    expect(result.issues.map((issue) => [issue.code, issue.message])).toEqual([["type", "/options must be object"]]);
  });
});
