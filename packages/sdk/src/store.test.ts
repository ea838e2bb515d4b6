import { describe, it, expect, beforeEach } from "vitest";
import { CustomerType, ProductType } from "@recordkit/testkit";
import {
  AlreadyExistsError,
  DirectAssignmentError,
  DoesNotExistError,
  MultipleReturnedError,
  RecordTypeError,
} from "./errors.js";
import { field } from "./fields.js";
import { RecordLifecycle } from "./lifecycle.js";
import { defineRecordType } from "./record-type.js";
import { RecordStore, getGlobalStore } from "./store.js";

const ItemType = defineRecordType({
  name: "ItemModel",
  keyFields: ["sku"],
  errorOnDuplicate: true,
  fields: { sku: field.string(), qty: field.integer() },
});

const EntryType = defineRecordType({
  name: "EntryModel",
  keyFields: ["group"],
  fields: { group: field.string(), n: field.integer(), meta: field.map({ default: true }) },
});

describe("RecordStore", () => {
  let store: RecordStore;
  let lifecycle: RecordLifecycle;

  beforeEach(() => {
    store = new RecordStore();
    lifecycle = new RecordLifecycle({ store });
  });

  describe("ordering", () => {
    it("should keep records sorted by key", () => {
      for (const id of ["P3", "P1", "P2"]) {
        lifecycle.create(ProductType, { prod_id: id, name: `Product ${id}`, category: "tools" });
      }

      expect(store.getAll(ProductType).map((record) => record.values.prod_id)).toEqual(["P1", "P2", "P3"]);
    });

    it("should keep insertion order among equal keys", () => {
      lifecycle.create(EntryType, { group: "a", n: 1 });
      lifecycle.create(EntryType, { group: "b", n: 2 });
      lifecycle.create(EntryType, { group: "a", n: 3 });

      expect(store.getAll(EntryType).map((record) => record.values.n)).toEqual([1, 3, 2]);
    });
  });

  describe("save()", () => {
    it("should ignore an identical record when duplicates are allowed", () => {
      const first = lifecycle.create(EntryType, { group: "a", n: 1 });
      const second = lifecycle.create(EntryType, { group: "a", n: 1 });

      expect(second).toBe(first);
      expect(store.count(EntryType)).toBe(1);
    });

    it("should reject an identical record when duplicates are forbidden", () => {
      lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });

      expect(() => lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" })).toThrow(
        new AlreadyExistsError("ProductModel", ["prod_id"], ["P1"])
      );
      expect(store.count(ProductType)).toBe(1);
    });

    it("should name the key fields and values of the duplicate", () => {
      const err = new AlreadyExistsError("ProductModel", ["prod_id"], ["P1"]);
      expect(err.message).toBe(
        "ProductModel: duplicates not allowed. Make sure there's no other ProductModel with fields (prod_id) " +
          'associated with values ("P1"), respectively.'
      );
      expect(err.code).toBe("E_EXISTS");
    });

    it("should keep records sharing a key but differing elsewhere", () => {
      lifecycle.create(ItemType, { sku: "A", qty: 1 });
      lifecycle.create(ItemType, { sku: "A", qty: 2 });

      expect(store.count(ItemType)).toBe(2);
      expect(() => store.get(ItemType, { sku: "A" })).toThrow(MultipleReturnedError);
      expect(() => store.get(ItemType, { sku: "A" })).toThrow('2 ItemModel records found matching params: {"sku":"A"}');
    });
  });

  describe("filter()", () => {
    beforeEach(() => {
      lifecycle.create(ProductType, { prod_id: "P2", name: "Hammer", category: "tools" });
      lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
      lifecycle.create(ProductType, { prod_id: "P3", name: "Novel", category: "books" });
    });

    it("should match every field given", () => {
      expect(store.filter(ProductType, { category: "tools" }).map((r) => r.values.prod_id)).toEqual(["P1", "P2"]);
      expect(store.filter(ProductType, { category: "tools", name: "Hammer" }).map((r) => r.values.prod_id)).toEqual([
        "P2",
      ]);
      expect(store.filter(ProductType, { category: "garden" })).toEqual([]);
    });

    it("should return everything without a predicate", () => {
      expect(store.filter(ProductType)).toHaveLength(3);
      expect(store.filter(ProductType, {})).toHaveLength(3);
    });

    it("should return a frozen snapshot", () => {
      const results = store.filter(ProductType);
      expect(Object.isFrozen(results)).toBe(true);

      lifecycle.create(ProductType, { prod_id: "P4", name: "Saw", category: "tools" });
      expect(results).toHaveLength(3);
    });

    it("should reject fields the type does not declare", () => {
      const where: { [field: string]: unknown } = { color: "red" };
      expect(() => store.filter(ProductType, where)).toThrow(
        new RecordTypeError('ProductModel has no field "color"')
      );
    });

    it("should reject undeclared fields for a type with no records", () => {
      const where: { [field: string]: unknown } = { color: "red" };
      expect(() => store.filter(CustomerType, where)).toThrow(
        new RecordTypeError('CustomerModel has no field "color"')
      );
      expect(store.typeNames()).not.toContain("CustomerModel");
    });

    it("should compare mappings structurally", () => {
      lifecycle.create(EntryType, { group: "a", n: 1, meta: { tag: "x", level: 2 } });

      expect(store.filter(EntryType, { meta: { level: 2, tag: "x" } })).toHaveLength(1);
      expect(store.filter(EntryType, { meta: { level: 3, tag: "x" } })).toHaveLength(0);
    });
  });

  describe("get()", () => {
    it("should return the single match", () => {
      lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
      expect(store.get(ProductType, { prod_id: "P1" }).values.name).toBe("Widget");
    });

    it("should fail when nothing matches", () => {
      expect(() => store.get(ProductType, { prod_id: "P9" })).toThrow(DoesNotExistError);
      expect(() => store.get(ProductType, { prod_id: "P9" })).toThrow(
        'A ProductModel record was not found matching params: {"prod_id":"P9"}'
      );
    });
  });

  describe("records", () => {
    it("should expose a read-only view by type name", () => {
      lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });

      expect(store.records.get("ProductModel")).toHaveLength(1);
      expect(store.typeNames()).toEqual(["ProductModel"]);
    });

    it("should refuse direct assignment", () => {
      expect(() => {
        store.records = new Map();
      }).toThrow(DirectAssignmentError);
    });
  });

  describe("export()", () => {
    it("should produce plain field mappings in store order", () => {
      lifecycle.create(ProductType, { prod_id: "P2", name: "Hammer", category: "tools" });
      lifecycle.create(EntryType, { group: "a", n: 1 });
      lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });

      expect(store.export()).toEqual({
        ProductModel: [
          { prod_id: "P1", name: "Widget", category: "tools" },
          { prod_id: "P2", name: "Hammer", category: "tools" },
        ],
        EntryModel: [{ group: "a", n: 1, meta: {} }],
      });
    });
  });

  describe("has() and count()", () => {
    it("should report stored records", () => {
      const other = new RecordLifecycle({ store: new RecordStore() });
      const record = lifecycle.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
      const lookalike = other.create(ProductType, { prod_id: "P1", name: "Widget", category: "tools" });
      const stranger = other.create(ProductType, { prod_id: "P2", name: "Hammer", category: "tools" });

      expect(store.has(record)).toBe(true);
      expect(store.has(lookalike)).toBe(true);
      expect(store.has(stranger)).toBe(false);
      expect(store.count()).toBe(1);
      expect(store.count(ItemType)).toBe(0);
    });
  });
});

describe("getGlobalStore", () => {
  it("should return one store per process", () => {
    expect(getGlobalStore()).toBe(getGlobalStore());
  });
});
