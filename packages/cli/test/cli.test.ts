/**
 * Integration tests for CLI commands, run in-process
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, readdir } from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { captureIO, createTempDir, removeDir, writeFixtures, type CliCapture } from "@recordkit/testkit";
import { runCli } from "../src/program.js";

const shopModule = fileURLToPath(new URL("../../testkit/src/shop.ts", import.meta.url));

const SHOP_YAML = `products:
  - prod_id: P2
    name: Hammer
    category: tools
  - prod_id: P1
    name: Widget
    category: tools
  - prod_id: P3
    name: Novel
    category: books
customers:
  - name: Ann
    age: 30
    email: ann@example.com
    flagged_interests: [tools]
  - name: Bob
    age: 41
    send_ads: true
    email: bob@example.com
    flagged_interests: [books]
`;

describe("CLI", () => {
  let tmpDir: string;
  let shopFile: string;
  let capture: CliCapture;

  async function run(...args: string[]): Promise<number> {
    return runCli(["node", "recordkit", ...args], capture.io);
  }

  beforeEach(async () => {
    tmpDir = await createTempDir();
    [shopFile] = await writeFixtures(tmpDir, { "shop.yaml": SHOP_YAML });
    capture = captureIO({ cwd: tmpDir });
  });

  afterEach(async () => {
    await removeDir(tmpDir);
  });

  describe("global options", () => {
    it("should print the version", async () => {
      expect(await run("--version")).toBe(0);
      expect(capture.stdout()).toBe("0.1.0\n");
    });

    it("should fail on an unknown command", async () => {
      expect(await run("export")).toBe(1);
      expect(capture.stderr()).toContain("unknown command 'export'");
    });

    it("should emit timing metrics when verbose", async () => {
      expect(await run("--verbose", "formats")).toBe(0);
      expect(capture.stderr()).toMatch(/^metric cli\.formats duration_ms=\d+ success=true\n$/);
    });
  });

  describe("formats", () => {
    it("should list one format per line", async () => {
      expect(await run("formats")).toBe(0);
      expect(capture.stdout()).toBe("ini\njson\ntoml\nyaml\nyml\n");
    });

    it("should list loader and dumper formats as JSON", async () => {
      expect(await run("formats", "--json")).toBe(0);
      expect(JSON.parse(capture.stdout())).toEqual({
        load: ["ini", "json", "toml", "yaml", "yml"],
        dump: ["ini", "json", "toml", "yaml", "yml"],
      });
    });
  });

  describe("convert", () => {
    it("should write the converted file beside the source", async () => {
      expect(await run("convert", "shop.yaml", "--to", "JSON")).toBe(0);

      const dstFile = path.join(tmpDir, "shop.json");
      expect(capture.stdout()).toBe(`✓ Converted shop.yaml -> ${dstFile}\n`);
      const converted: unknown = JSON.parse(await readFile(dstFile, "utf-8"));
      expect(converted).toMatchObject({ products: [{ prod_id: "P2" }, { prod_id: "P1" }, { prod_id: "P3" }] });
    });

    it("should write to --out, quietly with --quiet", async () => {
      expect(await run("--quiet", "convert", shopFile, "--to", "toml", "--out", "out/shop.toml")).toBe(0);

      expect(capture.stdout()).toBe("");
      expect(await readFile(path.join(tmpDir, "out", "shop.toml"), "utf-8")).toContain('prod_id = "P2"');
    });

    it("should print instead of writing with --stdout", async () => {
      const [settingsFile] = await writeFixtures(tmpDir, { "settings.ini": "[server]\nport=8080\n" });

      expect(await run("convert", settingsFile, "--to", "json", "--stdout")).toBe(0);
      expect(capture.stdout()).toBe('{\n  "server": {\n    "port": "8080"\n  }\n}\n');
      expect((await readdir(tmpDir)).sort()).toEqual(["settings.ini", "shop.yaml"]);
    });

    it("should refuse --out together with --stdout", async () => {
      expect(await run("convert", shopFile, "--to", "json", "--out", "a.json", "--stdout")).toBe(1);
      expect(capture.stderr()).toBe("Error: Cannot use both --out and --stdout\n");
    });

    it("should report unsupported extensions", async () => {
      const [notesFile] = await writeFixtures(tmpDir, { "notes.txt": "hello" });

      expect(await run("convert", notesFile, "--to", "json")).toBe(1);
      expect(capture.stderr()).toBe(
        'Error: File extension "txt" not supported. Supported formats are: ini, json, toml, yaml, yml\n'
      );
    });

    it("should require a target format", async () => {
      expect(await run("convert", shopFile)).toBe(1);
      expect(capture.stderr()).toContain("required option '--to <format>' not specified");
    });
  });

  describe("ingest", () => {
    it("should print the store export as JSON", async () => {
      expect(await run("--models", shopModule, "ingest", shopFile)).toBe(0);

      const exported: unknown = JSON.parse(capture.stdout());
      expect(exported).toEqual({
        ProductModel: [
          { prod_id: "P1", name: "Widget", category: "tools" },
          { prod_id: "P2", name: "Hammer", category: "tools" },
          { prod_id: "P3", name: "Novel", category: "books" },
        ],
        CustomerModel: [
          {
            name: "Ann",
            age: 30,
            send_ads: false,
            email: "ann@example.com",
            flagged_interests: [
              { prod_id: "P1", name: "Widget", category: "tools" },
              { prod_id: "P2", name: "Hammer", category: "tools" },
            ],
          },
          {
            name: "Bob",
            age: 41,
            send_ads: true,
            email: "bob@example.com",
            flagged_interests: [{ prod_id: "P3", name: "Novel", category: "books" }],
          },
        ],
      });
    });

    it("should take models from the environment and dump other formats", async () => {
      capture = captureIO({ cwd: tmpDir, env: { RECORDKIT_MODELS_MODULES: shopModule } });

      expect(await run("ingest", "shop.yaml", "--format", "yaml")).toBe(0);
      expect(capture.stdout()).toMatch(/^ProductModel:\n {2}- prod_id: P1\n/);
    });

    it("should skip every directive without models", async () => {
      expect(await run("ingest", shopFile)).toBe(0);
      expect(capture.stdout()).toBe("{}\n");
    });

    it("should fail on a duplicate record", async () => {
      expect(await run("--models", shopModule, "ingest", shopFile, shopFile)).toBe(1);
      expect(capture.stderr()).toBe(
        "Error: ProductModel: duplicates not allowed. Make sure there's no other ProductModel with fields (prod_id) " +
          'associated with values ("P2"), respectively.\n'
      );
    });
  });

  describe("query", () => {
    it("should print matching records by directive", async () => {
      expect(await run("--models", shopModule, "query", "products", shopFile, "--where", "category=tools")).toBe(0);

      expect(JSON.parse(capture.stdout())).toEqual([
        { prod_id: "P1", name: "Widget", category: "tools" },
        { prod_id: "P2", name: "Hammer", category: "tools" },
      ]);
    });

    it("should print a single record with --one", async () => {
      expect(
        await run("--models", shopModule, "query", "CustomerModel", shopFile, "--where", "age=41", "--one", "--raw")
      ).toBe(0);

      expect(capture.stdout()).toBe(
        '{"name":"Bob","age":41,"send_ads":true,"email":"bob@example.com",' +
          '"flagged_interests":[{"prod_id":"P3","name":"Novel","category":"books"}]}\n'
      );
    });

    it("should exit 2 when --one finds nothing", async () => {
      expect(
        await run("--models", shopModule, "query", "CustomerModel", shopFile, "--where", "email=eve@example.com", "--one")
      ).toBe(2);
      expect(capture.stderr()).toBe(
        'Error: A CustomerModel record was not found matching params: {"email":"eve@example.com"}\n'
      );
    });

    it("should reject an unknown type", async () => {
      expect(await run("--models", shopModule, "query", "orders", shopFile)).toBe(1);
      expect(capture.stderr()).toContain('Error: Unknown record type "orders". Registered types: ');
    });

    it("should reject an undeclared field", async () => {
      expect(await run("--models", shopModule, "query", "products", shopFile, "--where", "color=red")).toBe(1);
      expect(capture.stderr()).toBe('Error: ProductModel has no field "color"\n');
    });
  });

  describe("render", () => {
    beforeEach(async () => {
      await writeFixtures(tmpDir, {
        "tpl/customer.j2": "{{ name }} <{{ email }}>{% if shop %} @ {{ shop }}{% endif %}",
      });
    });

    it("should render every record of the type", async () => {
      expect(
        await run("--models", shopModule, "render", "customers", shopFile, "--templates", "tpl", "--var", "shop=Corner")
      ).toBe(0);

      expect(capture.stdout()).toBe("Ann <ann@example.com> @ Corner\nBob <bob@example.com> @ Corner\n");
    });

    it("should report a missing template", async () => {
      expect(await run("--models", shopModule, "render", "products", shopFile, "--templates", "tpl")).toBe(1);
      expect(capture.stderr()).toContain('Error: Failed to render template "product.j2"');
    });
  });
});
