/**
 * Ingestion: dispatch loaded data to record types by directive
 */

import { RecordTypeError } from "./errors.js";
import type { RecordLifecycle } from "./lifecycle.js";
import { logger } from "./observability/logs.js";
import type { StoredRecord } from "./record.js";
import type { RecordTypeRegistry } from "./registry.js";
import { describeValue, isPlainObject } from "./values.js";

export interface IngestContext {
  registry: RecordTypeRegistry;
  lifecycle: RecordLifecycle;
}

/**
 * Create records from a directive mapping
 *
 * Keys bound to a record type's directive are dispatched to that type; other
 * keys are skipped. Every element of a directive's list is ingested as a
 * directive mapping first, so records it declares exist before the outer
 * records are created; an element that is not a mapping fails.
 *
 * @example
 * ```typescript
 * generateFromMapping(
 *   { products: [{ prod_id: "P1", name: "Widget", category: "tools" }] },
 *   { registry, lifecycle }
 * );
 * ```
 *
 * @returns Every record created, in creation order
 * @throws {RecordTypeError} If the input, or an element of a directive's list, is not a mapping
 */
export function generateFromMapping(mapping: unknown, context: IngestContext): StoredRecord[] {
  if (!isPlainObject(mapping)) {
    throw new RecordTypeError(`Ingested data must be a mapping, but got ${describeValue(mapping)}`);
  }

  const directives = context.registry.directiveToType();
  const created: StoredRecord[] = [];

  for (const [key, value] of Object.entries(mapping)) {
    const type = directives.get(key);
    if (!type) {
      logger.debug("ingest.skip", { subject: key, message: "no record type bound to directive" });
      continue;
    }

    if (Array.isArray(value)) {
      for (const element of value) {
        created.push(...generateFromMapping(element, context));
      }
    }

    const records = context.lifecycle.createFromLoadedData(type, value);
    logger.debug("ingest.directive", { type: type.name, subject: key, details: { count: records.length } });
    created.push(...records);
  }

  return created;
}
