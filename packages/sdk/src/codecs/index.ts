/**
 * Codec table: format name to loader and dumper
 *
 * Loaders and dumpers come from modules exporting `{format}Loader` and
 * `{format}Dumper` functions. The built-in modules cover json, yaml, yml, toml
 * and ini; a configured module replaces either set.
 */

import * as path from "node:path";
import { DumperError, ModuleImportError, RecordKitError, UnsupportedFormatError } from "../errors.js";
import { atomicWrite, readTextFile } from "../io.js";
import { importModule } from "../module-loader.js";
import { logger } from "../observability/logs.js";
import type { Dumper, Loader } from "../types.js";
import * as builtinDumpers from "./dumpers.js";
import * as builtinLoaders from "./loaders.js";

const LOADER_EXPORT = /^([a-z0-9]+)Loader$/;
const DUMPER_EXPORT = /^([a-z0-9]+)Dumper$/;

/**
 * Collect `{format}Loader` exports
 */
export function collectLoaders(exports: object): Map<string, Loader> {
  const loaders = new Map<string, Loader>();
  for (const [name, fn] of Object.entries(exports)) {
    const format = LOADER_EXPORT.exec(name)?.[1];
    if (format !== undefined && typeof fn === "function") {
      loaders.set(format, (text: string): unknown => {
        const data: unknown = fn(text);
        return data;
      });
    }
  }
  return loaders;
}

/**
 * Collect `{format}Dumper` exports
 */
export function collectDumpers(exports: object): Map<string, Dumper> {
  const dumpers = new Map<string, Dumper>();
  for (const [name, fn] of Object.entries(exports)) {
    const format = DUMPER_EXPORT.exec(name)?.[1];
    if (format !== undefined && typeof fn === "function") {
      dumpers.set(format, (data: unknown): string => {
        const text: unknown = fn(data);
        if (typeof text !== "string") {
          throw new TypeError(`${name} returned ${typeof text}, expected a string`);
        }
        return text;
      });
    }
  }
  return dumpers;
}

/**
 * Default destination of a conversion: beside the source, with the new extension
 */
export function convertedPath(srcFile: string, dstFormat: string): string {
  const parsed = path.parse(srcFile);
  return path.join(parsed.dir, `${parsed.name}.${dstFormat.toLowerCase()}`);
}

export interface ConvertOptions {
  /** Destination path (default: the source path with the new extension) */
  dstFile?: string;
  /** Write the converted text (default: true) */
  save?: boolean;
}

export class CodecTable {
  readonly #loaders: ReadonlyMap<string, Loader>;
  readonly #dumpers: ReadonlyMap<string, Dumper>;

  constructor(loaders: ReadonlyMap<string, Loader>, dumpers: ReadonlyMap<string, Dumper>) {
    this.#loaders = loaders;
    this.#dumpers = dumpers;
  }

  /**
   * Table over the built-in json, yaml, yml, toml and ini codecs
   */
  static builtin(): CodecTable {
    return new CodecTable(collectLoaders(builtinLoaders), collectDumpers(builtinDumpers));
  }

  /**
   * Formats with a loader, sorted by name
   */
  supportedFormats(): string[] {
    return [...this.#loaders.keys()].sort();
  }

  /**
   * Formats with a dumper, sorted by name
   */
  dumpFormats(): string[] {
    return [...this.#dumpers.keys()].sort();
  }

  /**
   * Parse text in a format
   * @throws {ModuleImportError} If no loader handles the format
   */
  load(text: string, format: string): unknown {
    const loader = this.#loaders.get(format.toLowerCase());
    if (!loader) {
      throw new ModuleImportError(`No loader found for format "${format}"`);
    }
    return loader(text);
  }

  /**
   * Serialize data in a format
   * @throws {ModuleImportError} If no dumper handles the format
   * @throws {DumperError} If the dumper fails
   */
  dump(data: unknown, format: string): string {
    const dumper = this.#dumpers.get(format.toLowerCase());
    if (!dumper) {
      throw new ModuleImportError(`No dumper found for format "${format}"`);
    }
    try {
      return dumper(data);
    } catch (err) {
      if (err instanceof RecordKitError) {
        throw err;
      }
      throw new DumperError(format, { cause: err });
    }
  }

  /**
   * Format of a file, from its extension
   * @throws {UnsupportedFormatError} If no loader handles the extension
   */
  formatOf(filePath: string): string {
    const format = path.extname(filePath).slice(1).toLowerCase();
    if (!this.#loaders.has(format)) {
      throw new UnsupportedFormatError(format, this.supportedFormats());
    }
    return format;
  }

  /**
   * Read and parse a file, choosing the loader by extension
   * @throws {RecordTypeError} If the path is not an existing regular file
   * @throws {UnsupportedFormatError} If the extension is not supported
   */
  async loadFile(filePath: string): Promise<unknown> {
    const text = await readTextFile(filePath);
    const format = this.formatOf(filePath);
    logger.debug("codecs.load_file", { subject: format, message: filePath });
    return this.load(text, format);
  }

  /**
   * Serialize data and write it atomically
   * @returns The written text
   */
  async dumpFile(data: unknown, format: string, filePath: string): Promise<string> {
    const text = this.dump(data, format);
    await atomicWrite(filePath, text);
    logger.debug("codecs.dump_file", { subject: format, message: filePath });
    return text;
  }

  /**
   * Convert a file to another format
   * @returns The converted text
   */
  async convertFile(srcFile: string, dstFormat: string, options: ConvertOptions = {}): Promise<string> {
    const data = await this.loadFile(srcFile);
    const text = this.dump(data, dstFormat);

    if (options.save ?? true) {
      const dstFile = options.dstFile ?? convertedPath(srcFile, dstFormat);
      await atomicWrite(dstFile, text);
      logger.debug("codecs.convert", { subject: dstFormat, message: `${srcFile} -> ${dstFile}` });
    }

    return text;
  }
}

export interface CodecModules {
  /** Module replacing the built-in loaders */
  loadersModule?: string | undefined;
  /** Module replacing the built-in dumpers */
  dumpersModule?: string | undefined;
  /** Directory relative module paths resolve against */
  baseDir?: string;
}

/**
 * Build a codec table, importing configured loader and dumper modules
 * @throws {ModuleImportError} If a configured module cannot be imported
 */
export async function loadCodecTable(modules: CodecModules = {}): Promise<CodecTable> {
  const loaders = modules.loadersModule
    ? collectLoaders(await importModule(modules.loadersModule, modules.baseDir))
    : collectLoaders(builtinLoaders);
  const dumpers = modules.dumpersModule
    ? collectDumpers(await importModule(modules.dumpersModule, modules.baseDir))
    : collectDumpers(builtinDumpers);

  logger.debug("codecs.table", {
    details: { loaders: [...loaders.keys()], dumpers: [...dumpers.keys()] },
  });
  return new CodecTable(loaders, dumpers);
}
