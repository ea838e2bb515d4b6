/**
 * RecordKit facade: store, registry, lifecycle, codecs and renderer in one object
 */

import { CodecTable, loadCodecTable } from "./codecs/index.js";
import { getConfig, type RecordKitConfig } from "./config.js";
import type { FieldSpecs } from "./fields.js";
import { logger } from "./observability/logs.js";
import { generateFromMapping } from "./ingest.js";
import { RecordLifecycle } from "./lifecycle.js";
import type { Where } from "./query.js";
import type { StoredRecord } from "./record.js";
import type { RecordType } from "./record-type.js";
import { RecordTypeRegistry } from "./registry.js";
import { NunjucksRenderer } from "./render.js";
import { createRecordValidator } from "./schema/validator.js";
import { RecordStore, type StoreExport } from "./store.js";
import type { RecordValidator, Renderer, ValidationMode } from "./types.js";

export interface RecordKitOptions {
  /** Store records are saved into (default: a new store) */
  store?: RecordStore;
  /** Registry binding directives to types (default: a new registry) */
  registry?: RecordTypeRegistry;
  /** Validator (default: one in validationMode) */
  validator?: RecordValidator;
  /** Mode of the default validator (default: "strict") */
  validationMode?: ValidationMode;
  /** Codec table (default: built-in codecs) */
  codecs?: CodecTable;
  /** Renderer (default: Nunjucks over templatesDir) */
  renderer?: Renderer;
  /** Templates directory of the default renderer (default: "templates") */
  templatesDir?: string;
  /** Record types registered on open */
  types?: readonly RecordType[];
}

export interface RecordKit {
  readonly store: RecordStore;
  readonly registry: RecordTypeRegistry;
  readonly lifecycle: RecordLifecycle;
  readonly codecs: CodecTable;
  readonly renderer: Renderer;

  /** Register record types for ingestion */
  register(...types: RecordType[]): this;

  /** Create and save one record from a raw mapping */
  create<S extends FieldSpecs>(type: RecordType<S>, raw: unknown): StoredRecord<S>;

  /** Create and save records from a mapping or a list of mappings */
  createFromLoadedData<S extends FieldSpecs>(type: RecordType<S>, data: unknown): StoredRecord<S>[];

  /** Dispatch a directive mapping to the registered types */
  ingest(mapping: unknown): StoredRecord[];

  /** Load a file through the codecs and ingest it */
  ingestFile(filePath: string): Promise<StoredRecord[]>;

  filter<S extends FieldSpecs>(type: RecordType<S>, where?: Where<S>): readonly StoredRecord<S>[];
  get<S extends FieldSpecs>(type: RecordType<S>, where: Where<S>): StoredRecord<S>;
  getAll<S extends FieldSpecs>(type: RecordType<S>): readonly StoredRecord<S>[];
  export(): StoreExport;

  /** Serialize the store export in a format */
  dump(format: string): string;

  /** Render a record through its type's template */
  render<S extends FieldSpecs>(record: StoredRecord<S>, extraVars?: Record<string, unknown>): string;
}

class RecordKitImpl implements RecordKit {
  readonly store: RecordStore;
  readonly registry: RecordTypeRegistry;
  readonly lifecycle: RecordLifecycle;
  readonly codecs: CodecTable;
  readonly renderer: Renderer;

  constructor(options: RecordKitOptions) {
    this.store = options.store ?? new RecordStore();
    this.registry = options.registry ?? new RecordTypeRegistry();
    this.lifecycle = new RecordLifecycle({
      store: this.store,
      validator: options.validator ?? createRecordValidator({ mode: options.validationMode ?? "strict" }),
    });
    this.codecs = options.codecs ?? CodecTable.builtin();
    this.renderer = options.renderer ?? new NunjucksRenderer({ templatesDir: options.templatesDir ?? "templates" });
    if (options.types) {
      this.registry.register(...options.types);
    }
  }

  register(...types: RecordType[]): this {
    this.registry.register(...types);
    return this;
  }

  create<S extends FieldSpecs>(type: RecordType<S>, raw: unknown): StoredRecord<S> {
    return this.lifecycle.create(type, raw);
  }

  createFromLoadedData<S extends FieldSpecs>(type: RecordType<S>, data: unknown): StoredRecord<S>[] {
    return this.lifecycle.createFromLoadedData(type, data);
  }

  ingest(mapping: unknown): StoredRecord[] {
    return generateFromMapping(mapping, { registry: this.registry, lifecycle: this.lifecycle });
  }

  async ingestFile(filePath: string): Promise<StoredRecord[]> {
    const data = await this.codecs.loadFile(filePath);
    return this.ingest(data);
  }

  filter<S extends FieldSpecs>(type: RecordType<S>, where?: Where<S>): readonly StoredRecord<S>[] {
    return this.store.filter(type, where);
  }

  get<S extends FieldSpecs>(type: RecordType<S>, where: Where<S>): StoredRecord<S> {
    return this.store.get(type, where);
  }

  getAll<S extends FieldSpecs>(type: RecordType<S>): readonly StoredRecord<S>[] {
    return this.store.getAll(type);
  }

  export(): StoreExport {
    return this.store.export();
  }

  dump(format: string): string {
    return this.codecs.dump(this.store.export(), format);
  }

  render<S extends FieldSpecs>(record: StoredRecord<S>, extraVars?: Record<string, unknown>): string {
    return this.renderer.render(record, extraVars);
  }
}

/**
 * Open a RecordKit
 *
 * @example
 * ```typescript
 * const kit = openRecordKit({ types: [ProductType, CustomerType] });
 * await kit.ingestFile("shop.yaml");
 * const tools = kit.filter(ProductType, { category: "tools" });
 * ```
 */
export function openRecordKit(options: RecordKitOptions = {}): RecordKit {
  return new RecordKitImpl(options);
}

/**
 * Open a RecordKit from configuration, importing the configured model and codec modules
 * @param config - Configuration (default: read from the environment)
 * @param options - Overrides for the components configuration does not cover
 * @throws {ModuleImportError} If a configured module cannot be imported
 */
export async function loadRecordKit(
  config: RecordKitConfig = getConfig(),
  options: RecordKitOptions & { baseDir?: string } = {}
): Promise<RecordKit> {
  const { baseDir, ...kitOptions } = options;
  logger.setDebug(config.debug || undefined);
  const codecs =
    kitOptions.codecs ??
    (await loadCodecTable({
      loadersModule: config.loadersModule,
      dumpersModule: config.dumpersModule,
      baseDir,
    }));

  const kit = openRecordKit({
    validationMode: config.validationMode,
    templatesDir: config.templatesDir,
    ...kitOptions,
    codecs,
  });
  await kit.registry.loadModules(config.modelsModules, baseDir);
  return kit;
}
