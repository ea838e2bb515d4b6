/**
 * Deterministic JSON formatting utilities
 */

export type KeyOrder = "alpha" | "insertion" | readonly string[];

/**
 * Deterministic comparison for object keys using Unicode code point order
 */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param value - Value to stringify (plain JSON data)
 * @param indent - Number of spaces for indentation (default: 2; 0 for compact output)
 * @param order - Key ordering: "alpha", "insertion" or an explicit list (default: "alpha")
 * @returns Formatted JSON string, with a trailing newline unless compact
 * @throws Error if circular references are detected
 */
export function stableStringify(value: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return compareCodePoints(a, b);
    }
    if (order === "insertion") {
      return 0;
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    // If both in order array, use their positions
    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    // If only a is in order, it comes first
    if (aIndex !== -1) return -1;
    // If only b is in order, it comes first
    if (bIndex !== -1) return 1;
    // Both not in order array, fallback to code point order
    return compareCodePoints(a, b);
  };

  const normalize = (input: unknown): unknown => {
    if (input !== null && typeof input === "object") {
      // Detect cycles
      if (seen.has(input)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(input);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(input)) {
          return input.map(normalize);
        }

        // Objects: sort keys and normalize values
        const entries = Object.entries(input);
        entries.sort(([a], [b]) => sorter(a, b));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(input);
      }
    }
    return input;
  };

  const json = JSON.stringify(normalize(value), null, indent);
  return indent > 0 ? json + "\n" : json;
}
