/**
 * Custom format validators for field validation
 */

import type { FormatValidator } from "../types.js";

/**
 * Validates slug format: lowercase alphanumeric with hyphens
 * Pattern: /^[a-z0-9]+(?:-[a-z0-9]+)*$/
 * @example "hello-world" ✓, "Hello-World" ✗, "hello_world" ✗
 */
export const slugFormat: FormatValidator = (value: string): boolean => {
  if (typeof value !== "string" || value.length === 0) {
    return false;
  }
  return /^[a-z0-9]+(?:-[a-z0-9]+)*$/.test(value);
};

/**
 * Validates identifier format: letter or underscore, then letters, digits or underscores
 * @example "prod_id" ✓, "_x1" ✓, "1abc" ✗, "a-b" ✗
 */
export const identifierFormat: FormatValidator = (value: string): boolean => {
  if (typeof value !== "string") {
    return false;
  }
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(value);
};

/**
 * Formats registered on every validator, in addition to those of ajv-formats
 */
export const DEFAULT_FORMATS: Record<string, FormatValidator> = {
  slug: slugFormat,
  identifier: identifierFormat,
};
