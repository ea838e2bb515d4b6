/**
 * Turn `--where field=value` text into typed predicate values
 */

import type { FieldSpec, RecordType, Where } from "@recordkit/sdk";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Convert one value to the kind its field declares
 * Undeclared fields keep the text; the store rejects them.
 */
function coerce(spec: FieldSpec | undefined, field: string, text: string): unknown {
  switch (spec?.kind) {
    case undefined:
    case "string":
      return text;
    case "integer":
    case "number": {
      const value = Number(text);
      if (text.trim() === "" || Number.isNaN(value)) {
        throw new CliError(`--where ${field} must be a number, got "${text}"`);
      }
      return value;
    }
    case "boolean":
      if (text === "true" || text === "false") {
        return text === "true";
      }
      throw new CliError(`--where ${field} must be true or false, got "${text}"`);
    default:
      return parseJson(text, `--where ${field}`);
  }
}

export function coerceWhere(type: RecordType, assignments: Record<string, string>): Where {
  const where: Record<string, unknown> = {};
  for (const [field, text] of Object.entries(assignments)) {
    const spec: FieldSpec | undefined = type.fields[field];
    where[field] = coerce(spec, field, text);
  }
  return where;
}
