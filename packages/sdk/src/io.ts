/**
 * File I/O for codecs: checked reads and atomic writes
 */

import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { randomUUID } from "node:crypto";
import { basename, dirname, join } from "node:path";
import { RecordTypeError } from "./errors.js";

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Read a UTF-8 text file
 * @throws {RecordTypeError} If the path does not exist or is not a regular file
 */
export async function readTextFile(filePath: string): Promise<string> {
  let stats: Stats;
  try {
    stats = await fs.stat(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") {
      throw new RecordTypeError(`${filePath} does not exist`, { cause: err });
    }
    throw err;
  }

  if (!stats.isFile()) {
    throw new RecordTypeError(`${filePath} is not a file`);
  }

  return fs.readFile(filePath, "utf-8");
}

/**
 * Create a directory and its parents if missing
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Write a file atomically: temp file in the same directory, then rename
 * @param filePath - Destination path; parent directories are created
 * @param content - UTF-8 text
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  try {
    await fs.writeFile(tmp, content, "utf-8");
    await fs.rename(tmp, filePath);
  } catch (err) {
    // Remove the temp file, then surface the original failure
    await fs.rm(tmp, { force: true });
    throw err;
  }
}
