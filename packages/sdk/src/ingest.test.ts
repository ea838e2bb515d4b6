import { describe, it, expect, beforeEach } from "vitest";
import { CustomerType, ProductType, shopData } from "@recordkit/testkit";
import { RecordTypeError } from "./errors.js";
import { field } from "./fields.js";
import { generateFromMapping, type IngestContext } from "./ingest.js";
import { RecordLifecycle } from "./lifecycle.js";
import { defineRecordType } from "./record-type.js";
import { RecordTypeRegistry } from "./registry.js";
import { RecordStore } from "./store.js";

describe("generateFromMapping", () => {
  let store: RecordStore;
  let context: IngestContext;

  beforeEach(() => {
    store = new RecordStore();
    context = {
      registry: new RecordTypeRegistry().register(ProductType, CustomerType),
      lifecycle: new RecordLifecycle({ store }),
    };
  });

  it("should create records for each directive in order", () => {
    const created = generateFromMapping(
      {
        products: [{ prod_id: "P1", name: "Widget", category: "tools" }],
        customers: [{ name: "Ann", age: 30, email: "a@x.com", flagged_interests: ["tools"] }],
      },
      context
    );

    expect(created.map(String)).toEqual([
      'ProductModel(prod_id="P1", name="Widget", category="tools")',
      expect.stringMatching(/^CustomerModel\(name="Ann", age=30, send_ads=false, email="a@x.com", flagged_interests=/),
    ]);
    const ann = store.get(CustomerType, { email: "a@x.com" });
    expect(ann.values.flagged_interests.items).toEqual([store.get(ProductType, { prod_id: "P1" })]);
  });

  it("should resolve every category a customer names", () => {
    generateFromMapping(shopData(), context);

    const bob = store.get(CustomerType, { email: "bob@example.com" });
    expect(bob.values.flagged_interests.items.map((product) => product.values.prod_id)).toEqual(["P3", "P1", "P2"]);
    expect(store.count(ProductType)).toBe(3);
    expect(store.count(CustomerType)).toBe(2);
  });

  it("should skip keys without a record type", () => {
    const created = generateFromMapping(
      { version: 2, products: { prod_id: "P1", name: "Widget", category: "tools" } },
      context
    );

    expect(created).toHaveLength(1);
    expect(store.typeNames()).toEqual(["ProductModel"]);
  });

  it("should ingest directives nested in list elements first", () => {
    const ShelfType = defineRecordType({
      name: "ShelfModel",
      directive: "shelves",
      keyFields: ["label"],
      fields: { label: field.string() },
    });
    context.registry.register(ShelfType);

    const created = generateFromMapping(
      {
        shelves: [{ label: "front", products: [{ prod_id: "P1", name: "Widget", category: "tools" }] }],
      },
      context
    );

    expect(created.map((record) => record.type.name)).toEqual(["ProductModel", "ShelfModel"]);
    expect(store.get(ShelfType, { label: "front" }).toPlain()).toEqual({ label: "front" });
  });

  it("should reject a directive list element that is not a mapping", () => {
    expect(() => generateFromMapping({ products: ["P1"] }, context)).toThrow(
      new RecordTypeError("Ingested data must be a mapping, but got string")
    );
    expect(store.count()).toBe(0);
  });

  it("should reject input that is not a mapping", () => {
    expect(() => generateFromMapping([{ products: [] }], context)).toThrow(
      new RecordTypeError("Ingested data must be a mapping, but got array")
    );
  });
});
