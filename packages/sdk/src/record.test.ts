import { describe, it, expect } from "vitest";
import { ProductType } from "@recordkit/testkit";
import { InitializationError } from "./errors.js";
import { field } from "./fields.js";
import { HashableMap } from "./hashable-map.js";
import { RecordLifecycle } from "./lifecycle.js";
import { StoredRecord } from "./record.js";
import { defineRecordType } from "./record-type.js";
import { RecordStore } from "./store.js";

function freshLifecycle(): RecordLifecycle {
  return new RecordLifecycle({ store: new RecordStore() });
}

describe("StoredRecord", () => {
  it("should not be constructible outside the lifecycle", () => {
    expect(
      () => new StoredRecord(Symbol("outsider"), ProductType, { prod_id: "P1", name: "Widget", category: "tools" })
    ).toThrow(
      new InitializationError(
        "Cannot instantiate StoredRecord directly; create records through RecordLifecycle.create()"
      )
    );
  });

  it("should expose its key in key field order", () => {
    const PairType = defineRecordType({
      name: "PairModel",
      keyFields: ["b", "a"],
      fields: { a: field.string(), b: field.integer(), c: field.boolean() },
    });
    const record = freshLifecycle().create(PairType, { a: "x", b: 2, c: true });

    expect(record.key).toEqual([2, "x"]);
    expect(record.values.c).toBe(true);
  });

  it("should list plain fields in declaration order", () => {
    const record = freshLifecycle().create(ProductType, { category: "tools", name: "Widget", prod_id: "P1" });

    expect(Object.keys(record.toPlain())).toEqual(["prod_id", "name", "category"]);
    expect(JSON.stringify(record)).toBe('{"prod_id":"P1","name":"Widget","category":"tools"}');
  });

  it("should describe itself with canonical field values", () => {
    const record = freshLifecycle().create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
    expect(String(record)).toBe('ProductModel(prod_id="P1", name="Widget", category="tools")');
  });

  it("should be equal to a record made from the same data in another store", () => {
    const data = { prod_id: "P1", name: "Widget", category: "tools" };
    const a = freshLifecycle().create(ProductType, data);
    const b = freshLifecycle().create(ProductType, { ...data });

    expect(a).not.toBe(b);
    expect(a.equals(b)).toBe(true);
    expect(a.hash).toBe(b.hash);
  });

  it("should hash every field, not only the key", () => {
    const lifecycle = freshLifecycle();
    const a = lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
    const b = lifecycle.create(ProductType, { prod_id: "P1", name: "Gadget", category: "tools" });

    expect(a.hash).not.toBe(b.hash);
    expect(a.equals(b)).toBe(false);
  });

  it("should hold nested mappings as HashableMaps", () => {
    const ServerType = defineRecordType({
      name: "ServerModel",
      keyFields: ["host"],
      fields: { host: field.string(), options: field.map() },
    });
    const record = freshLifecycle().create(ServerType, { host: "db", options: { tls: { enabled: true } } });

    expect(record.values.options).toBeInstanceOf(HashableMap);
    expect(record.toPlain()).toEqual({ host: "db", options: { tls: { enabled: true } } });
  });

  it("should reject unknown field names", () => {
    const record = freshLifecycle().create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
    expect(() => record.field("price")).toThrow('ProductModel has no field "price"');
  });

  it("should be immutable", () => {
    const record = freshLifecycle().create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.values)).toBe(true);
    expect(record.kind).toBe("record:ProductModel");
  });
});
