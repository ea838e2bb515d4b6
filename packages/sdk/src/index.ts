/**
 * recordkit SDK
 *
 * Typed, hashable records populated from semi-structured data and kept in a
 * sorted, type-partitioned in-memory store
 */

// Re-export types
export type {
  ValidationMode,
  ValidationIssue,
  ValidationIssueCode,
  ValidationResult,
  RecordValidator,
  FormatValidator,
  Renderer,
  Loader,
  Dumper,
} from "./types.js";

// Values
export type { Scalar, HashableValue, PlainValue, Hashable } from "./values.js";
export { HASHABLE, isHashable, isScalar, isPlainObject, kindOf, canonicalOf, valuesEqual, toPlain } from "./values.js";
export { HashableMap } from "./hashable-map.js";
export { OneToMany } from "./one-to-many.js";

// Record types and records
export type {
  ElementGuard,
  FieldSpec,
  FieldSpecs,
  FieldValues,
  ValueOf,
  StringField,
  IntegerField,
  NumberField,
  BooleanField,
  MapField,
  OneToManyField,
  ReferenceField,
} from "./fields.js";
export { field, elements, hasDefault } from "./fields.js";
export type {
  RecordType,
  RecordTypeOptions,
  RawFields,
  ExtraFieldsPolicy,
  PrepareContext,
  PrepareHook,
} from "./record-type.js";
export { defineRecordType, isRecordType, templateNameFor } from "./record-type.js";
export { StoredRecord } from "./record.js";

// Store, lifecycle, registry, ingestion
export type { Where } from "./query.js";
export { assertWhereFields, matchesWhere, compareValues, compareKeys } from "./query.js";
export { RecordStore, getGlobalStore, type StoreExport } from "./store.js";
export { RecordLifecycle, type RecordLifecycleOptions } from "./lifecycle.js";
export { RecordTypeRegistry } from "./registry.js";
export { generateFromMapping, type IngestContext } from "./ingest.js";
export { importModule, resolveSpecifier } from "./module-loader.js";

// Collaborators
export { createRecordValidator, RecordValidatorImpl, type RecordValidatorOptions } from "./schema/validator.js";
export { buildJsonSchema, fieldSchema, type JsonSchema } from "./schema/json-schema.js";
export { DEFAULT_FORMATS, slugFormat, identifierFormat } from "./schema/formats.js";
export {
  CodecTable,
  loadCodecTable,
  collectLoaders,
  collectDumpers,
  convertedPath,
  type ConvertOptions,
  type CodecModules,
} from "./codecs/index.js";
export { jsonLoader, yamlLoader, ymlLoader, tomlLoader, iniLoader } from "./codecs/loaders.js";
export { jsonDumper, yamlDumper, ymlDumper, tomlDumper, iniDumper } from "./codecs/dumpers.js";
export { NunjucksRenderer, type NunjucksRendererOptions } from "./render.js";
export { loadConfig, getConfig, type RecordKitConfig } from "./config.js";
export { openRecordKit, loadRecordKit, type RecordKit, type RecordKitOptions } from "./kit.js";
export { stableStringify } from "./format.js";
export { logger, Logger, type LogLevel, type LogEntry } from "./observability/logs.js";
export { VERSION } from "./version.js";

// Errors
export {
  RecordKitError,
  InitializationError,
  RecordTypeError,
  RecordValidationError,
  RecordValueError,
  AlreadyExistsError,
  DoesNotExistError,
  MultipleReturnedError,
  DirectAssignmentError,
  ModuleImportError,
  UnsupportedFormatError,
  DumperError,
  RenderingError,
  ConfigError,
} from "./errors.js";
