/**
 * Template rendering of records (Nunjucks)
 */

import nunjucks from "nunjucks";
import type { Environment } from "nunjucks";
import { RenderingError } from "./errors.js";
import type { FieldSpecs } from "./fields.js";
import type { StoredRecord } from "./record.js";
import type { RecordType } from "./record-type.js";
import type { Renderer } from "./types.js";

export interface NunjucksRendererOptions {
  /** Directory templates are looked up in */
  templatesDir: string;
  /** Template file extension (default: ".j2") */
  extension?: string;
}

/**
 * Renders a record's plain field mapping through its type's template
 *
 * @example
 * ```typescript
 * const renderer = new NunjucksRenderer({ templatesDir: "templates" });
 * // CustomerModel records render templates/customer.j2
 * renderer.render(customer, { generatedBy: "recordkit" });
 * ```
 */
export class NunjucksRenderer implements Renderer {
  readonly extension: string;
  #env: Environment;

  constructor(options: NunjucksRendererOptions) {
    this.extension = options.extension ?? ".j2";
    // Plain-text output: no HTML autoescaping
    this.#env = new nunjucks.Environment(new nunjucks.FileSystemLoader(options.templatesDir), {
      autoescape: false,
    });
  }

  /**
   * Template file name for a record type
   */
  templateFor<S extends FieldSpecs>(type: RecordType<S>): string {
    return `${type.template}${this.extension}`;
  }

  /**
   * @throws {RenderingError} If the template is missing or fails to render
   */
  render<S extends FieldSpecs>(record: StoredRecord<S>, extraVars: Record<string, unknown> = {}): string {
    const template = this.templateFor(record.type);
    try {
      return this.#env.render(template, { ...record.toPlain(), ...extraVars });
    } catch (err) {
      throw new RenderingError(template, { cause: err });
    }
  }
}
