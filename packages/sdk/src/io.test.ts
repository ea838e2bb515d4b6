import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir } from "@recordkit/testkit";
import { RecordTypeError } from "./errors.js";
import { atomicWrite, ensureDirectory, readTextFile } from "./io.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("atomicWrite", () => {
    it("should write the content and leave no temp files", async () => {
      const filePath = join(testDir, "out.json");
      await atomicWrite(filePath, '{"a": 1}\n');

      expect(await readFile(filePath, "utf-8")).toBe('{"a": 1}\n');
      expect(await readdir(testDir)).toEqual(["out.json"]);
    });

    it("should replace an existing file", async () => {
      const filePath = join(testDir, "out.txt");
      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readFile(filePath, "utf-8")).toBe("second");
    });

    it("should create parent directories", async () => {
      const filePath = join(testDir, "a", "b", "out.txt");
      await atomicWrite(filePath, "nested");

      expect(await readFile(filePath, "utf-8")).toBe("nested");
    });

    it("should surface the failure and clean up when the target is a directory", async () => {
      const target = join(testDir, "taken");
      await mkdir(target);

      await expect(atomicWrite(target, "x")).rejects.toThrow();
      expect(await readdir(testDir)).toEqual(["taken"]);
    });
  });

  describe("readTextFile", () => {
    it("should read UTF-8 text", async () => {
      const filePath = join(testDir, "in.txt");
      await writeFile(filePath, "héllo", "utf-8");

      expect(await readTextFile(filePath)).toBe("héllo");
    });

    it("should reject a missing path", async () => {
      const filePath = join(testDir, "missing.json");
      await expect(readTextFile(filePath)).rejects.toThrow(new RecordTypeError(`${filePath} does not exist`));
    });

    it("should reject a directory", async () => {
      await expect(readTextFile(testDir)).rejects.toThrow(new RecordTypeError(`${testDir} is not a file`));
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories and tolerate existing ones", async () => {
      const dir = join(testDir, "x", "y");
      await ensureDirectory(dir);
      await ensureDirectory(dir);

      expect(await readdir(join(testDir, "x"))).toEqual(["y"]);
    });
  });
});
