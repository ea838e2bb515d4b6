/**
 * Record type registry
 *
 * Types are registered explicitly at startup, or by loading the modules that
 * export them. The registry binds ingestion directives to types.
 */

import { RecordTypeError } from "./errors.js";
import { importModule } from "./module-loader.js";
import { logger } from "./observability/logs.js";
import { isRecordType, type RecordType } from "./record-type.js";

export class RecordTypeRegistry {
  #types = new Map<string, RecordType>();
  #directives: ReadonlyMap<string, RecordType> | undefined;

  /**
   * Register record types
   * Registering the same type twice is a no-op.
   * @throws {RecordTypeError} If a different type is already registered under the same name
   */
  register(...types: RecordType[]): this {
    for (const type of types) {
      const existing = this.#types.get(type.name);
      if (existing === type) {
        continue;
      }
      if (existing) {
        throw new RecordTypeError(`A different record type named "${type.name}" is already registered`);
      }
      this.#types.set(type.name, type);
      this.#directives = undefined;
      logger.debug("registry.register", { type: type.name, subject: type.directive });
    }
    return this;
  }

  get(name: string): RecordType | undefined {
    return this.#types.get(name);
  }

  has(name: string): boolean {
    return this.#types.has(name);
  }

  /**
   * Registered types, in registration order
   */
  list(): RecordType[] {
    return [...this.#types.values()];
  }

  /**
   * Directive to record type, over types declaring a directive
   * Built on first use and after each registration. When two types claim one
   * directive, the later registration wins.
   */
  directiveToType(): ReadonlyMap<string, RecordType> {
    if (this.#directives) {
      return this.#directives;
    }

    const map = new Map<string, RecordType>();
    for (const type of this.#types.values()) {
      if (!type.directive) {
        continue;
      }
      const previous = map.get(type.directive);
      if (previous) {
        logger.warn("registry.directive_collision", {
          type: type.name,
          subject: type.directive,
          message: `directive already claimed by ${previous.name}; ${type.name} takes it`,
        });
      }
      map.set(type.directive, type);
    }

    this.#directives = map;
    return map;
  }

  /**
   * Import modules and register every record type they export
   * @param specifiers - Package names or file paths
   * @param baseDir - Directory relative paths resolve against (default: cwd)
   * @returns The types found, in module then export order
   * @throws {ModuleImportError} If a module cannot be imported
   */
  async loadModules(specifiers: readonly string[], baseDir?: string): Promise<RecordType[]> {
    const found: RecordType[] = [];
    for (const specifier of specifiers) {
      const exports = await importModule(specifier, baseDir);
      const types = Object.values(exports).filter(isRecordType);
      logger.debug("registry.load_module", {
        subject: specifier,
        details: { types: types.map((type) => type.name) },
      });
      this.register(...types);
      found.push(...types);
    }
    return found;
  }
}
