/**
 * Dynamic import of configured modules (record types, loaders, dumpers)
 */

import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { ModuleImportError } from "./errors.js";

/**
 * Whether a specifier names a file rather than a package
 */
export function isPathSpecifier(specifier: string): boolean {
  return (
    specifier.startsWith("./") ||
    specifier.startsWith("../") ||
    specifier === "." ||
    specifier === ".." ||
    path.isAbsolute(specifier)
  );
}

/**
 * Resolve a specifier into something import() accepts
 * @param specifier - Package name, or a relative/absolute file path
 * @param baseDir - Directory relative paths resolve against (default: cwd)
 */
export function resolveSpecifier(specifier: string, baseDir: string = process.cwd()): string {
  if (isPathSpecifier(specifier)) {
    return pathToFileURL(path.resolve(baseDir, specifier)).href;
  }
  return specifier;
}

/**
 * Import a module and return its exports by name
 * @throws {ModuleImportError} If the module cannot be located or fails to load
 */
export async function importModule(
  specifier: string,
  baseDir: string = process.cwd()
): Promise<Record<string, unknown>> {
  if (specifier.trim() === "") {
    throw new ModuleImportError("Module specifier must be a non-empty string");
  }

  let mod: unknown;
  try {
    mod = await import(resolveSpecifier(specifier, baseDir));
  } catch (err) {
    const reason = err instanceof Error ? `: ${err.message}` : "";
    throw new ModuleImportError(`Could not import module "${specifier}"${reason}`, { cause: err });
  }

  if (typeof mod !== "object" || mod === null) {
    throw new ModuleImportError(`Module "${specifier}" did not produce a namespace object`);
  }
  return Object.fromEntries(Object.entries(mod));
}
