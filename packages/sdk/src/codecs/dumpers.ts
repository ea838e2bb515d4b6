/**
 * Built-in dumpers: `{format}Dumper(data)` serializes nested data into text
 */

import ini from "ini";
import { stringify as stringifyToml } from "smol-toml";
import YAML from "yaml";
import { stableStringify } from "../format.js";
import { describeValue, isPlainObject, isScalar } from "../values.js";

export function jsonDumper(data: unknown): string {
  return stableStringify(data, 2, "insertion");
}

export function yamlDumper(data: unknown): string {
  return YAML.stringify(data);
}

export function ymlDumper(data: unknown): string {
  return yamlDumper(data);
}

function assertNoNull(value: unknown, path: string): void {
  if (value === null || value === undefined) {
    throw new TypeError(`TOML cannot represent ${String(value)} (at ${path || "root"})`);
  }
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => assertNoNull(item, `${path}[${index}]`));
  } else if (isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      assertNoNull(item, path ? `${path}.${key}` : key);
    }
  }
}

/**
 * Serialize a mapping as TOML
 * @throws {TypeError} If data is not a mapping or holds null anywhere
 */
export function tomlDumper(data: unknown): string {
  if (!isPlainObject(data)) {
    throw new TypeError(`TOML documents must be mappings, got ${describeValue(data)}`);
  }
  assertNoNull(data, "");
  return stringifyToml(data);
}

/**
 * Serialize a mapping of sections as INI
 * @throws {TypeError} If data is not a mapping of sections holding scalar values
 */
export function iniDumper(data: unknown): string {
  if (!isPlainObject(data)) {
    throw new TypeError(`INI documents must be mappings of sections, got ${describeValue(data)}`);
  }
  for (const [section, values] of Object.entries(data)) {
    if (!isPlainObject(values)) {
      throw new TypeError(`INI section "${section}" must be a mapping, got ${describeValue(values)}`);
    }
    for (const [key, value] of Object.entries(values)) {
      if (!isScalar(value) || value === null) {
        throw new TypeError(`INI value ${section}.${key} must be a string, number or boolean`);
      }
    }
  }
  return ini.stringify(data);
}
