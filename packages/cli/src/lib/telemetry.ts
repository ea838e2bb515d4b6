/**
 * Telemetry and observability helpers
 */

import type { CliIO } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line to stderr
 */
export function emitMetric(io: CliIO, key: string, fields: Record<string, unknown>): void {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  io.stderr(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics, emitted when verbose
 */
export async function withTiming<T>(
  io: CliIO,
  verbose: boolean,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    if (verbose) {
      emitMetric(io, label, {
        duration_ms: Date.now() - start,
        success,
      });
    }
  }
}
