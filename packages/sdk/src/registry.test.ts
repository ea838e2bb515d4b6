import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { ProductType } from "@recordkit/testkit";
import { ModuleImportError, RecordTypeError } from "./errors.js";
import { field } from "./fields.js";
import { defineRecordType } from "./record-type.js";
import { RecordTypeRegistry } from "./registry.js";

const shopModule = fileURLToPath(new URL("../../testkit/src/shop.ts", import.meta.url));

function itemType(name: string, directive?: string) {
  return defineRecordType({ name, directive, keyFields: ["id"], fields: { id: field.string() } });
}

describe("RecordTypeRegistry", () => {
  let registry: RecordTypeRegistry;

  beforeEach(() => {
    registry = new RecordTypeRegistry();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("register()", () => {
    it("should keep types in registration order", () => {
      const first = itemType("FirstModel");
      const second = itemType("SecondModel");
      registry.register(second, first);

      expect(registry.list()).toEqual([second, first]);
      expect(registry.get("FirstModel")).toBe(first);
      expect(registry.has("ThirdModel")).toBe(false);
    });

    it("should ignore a type registered twice", () => {
      registry.register(ProductType).register(ProductType);
      expect(registry.list()).toHaveLength(1);
    });

    it("should reject a different type under a taken name", () => {
      registry.register(itemType("ItemModel"));
      expect(() => registry.register(itemType("ItemModel"))).toThrow(
        new RecordTypeError('A different record type named "ItemModel" is already registered')
      );
    });
  });

  describe("directiveToType()", () => {
    it("should bind directives to the types declaring them", () => {
      const plain = itemType("PlainModel");
      registry.register(ProductType, plain);

      const directives = registry.directiveToType();
      expect([...directives.keys()]).toEqual(["products"]);
      expect(directives.get("products")).toBe(ProductType);
    });

    it("should let the later type win a directive and warn once", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const first = itemType("FirstModel", "items");
      const second = itemType("SecondModel", "items");
      registry.register(first, second);

      expect(registry.directiveToType().get("items")).toBe(second);
      expect(registry.directiveToType().get("items")).toBe(second);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toContain(
        "[WARN] [registry.directive_collision] SecondModel/items directive already claimed by FirstModel; SecondModel takes it"
      );
    });

    it("should rebuild after a registration", () => {
      registry.register(itemType("FirstModel", "items"));
      expect(registry.directiveToType().has("products")).toBe(false);

      registry.register(ProductType);
      expect(registry.directiveToType().get("products")).toBe(ProductType);
    });
  });

  describe("loadModules()", () => {
    it("should register every record type a module exports", async () => {
      const types = await registry.loadModules([shopModule]);

      expect(types.map((type) => type.name).sort()).toEqual(["CustomerModel", "ProductModel"]);
      expect(registry.has("CustomerModel")).toBe(true);
      expect(registry.directiveToType().has("customers")).toBe(true);
    });

    it("should find nothing in a module without record types", async () => {
      await expect(registry.loadModules(["node:path"])).resolves.toEqual([]);
    });

    it("should fail on a module that cannot be imported", async () => {
      await expect(registry.loadModules(["./no-such-models.js"], fileURLToPath(new URL(".", import.meta.url)))).rejects.toThrow(
        ModuleImportError
      );
      await expect(registry.loadModules(["./no-such-models.js"])).rejects.toThrow(
        'Could not import module "./no-such-models.js"'
      );
    });
  });
});
