/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "recordkit-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "recordkit-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory, removed afterwards
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write fixture files under a directory
 * @param dir - Base directory
 * @param files - Relative path to file content
 * @returns Absolute paths, in the order given
 */
export async function writeFixtures(dir: string, files: Record<string, string>): Promise<string[]> {
  const written: string[] = [];
  for (const [relative, content] of Object.entries(files)) {
    const target = join(dir, relative);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
    written.push(target);
  }
  return written;
}
