/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a `key=value` argument
 * The value may itself contain "=".
 */
export function parseAssignment(value: string, name: string): [string, string] {
  const index = value.indexOf("=");
  const key = index === -1 ? "" : value.slice(0, index).trim();

  if (key === "") {
    throw new InvalidArgumentError(`${name} must look like key=value, got "${value}"`);
  }

  return [key, value.slice(index + 1)];
}

/**
 * Accumulate a repeatable `key=value` option into a mapping
 */
export function collectAssignments(name: string) {
  return (value: string, previous: Record<string, string> = {}): Record<string, string> => {
    const [key, assigned] = parseAssignment(value, name);
    return { ...previous, [key]: assigned };
  };
}

/**
 * Accumulate a repeatable option whose values may also be comma-separated
 */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
  return [...previous, ...items];
}

/**
 * Parse a format name: lowercase letters and digits
 */
export function parseFormat(value: string): string {
  const format = value.trim().toLowerCase().replace(/^\./, "");

  if (!/^[a-z0-9]+$/.test(format)) {
    throw new InvalidArgumentError(`"${value}" is not a format name`);
  }

  return format;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
