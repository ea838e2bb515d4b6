/**
 * Built-in loaders: `{format}Loader(text)` parses text into nested data
 */

import ini from "ini";
import { parse as parseToml } from "smol-toml";
import YAML from "yaml";
import { isPlainObject } from "../values.js";

export function jsonLoader(text: string): unknown {
  return JSON.parse(text);
}

export function yamlLoader(text: string): unknown {
  return YAML.parse(text);
}

export function ymlLoader(text: string): unknown {
  return yamlLoader(text);
}

export function tomlLoader(text: string): unknown {
  return parseToml(text);
}

/**
 * Parse INI text, keeping only sections; keys outside any section are dropped
 */
export function iniLoader(text: string): unknown {
  const parsed: Record<string, unknown> = ini.parse(text);
  const sections: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (isPlainObject(value)) {
      sections[name] = value;
    }
  }
  return sections;
}
