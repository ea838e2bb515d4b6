/**
 * Process configuration from environment variables
 *
 * | Variable                   | Setting          | Default     |
 * | -------------------------- | ---------------- | ----------- |
 * | RECORDKIT_TEMPLATES_DIR    | templatesDir     | "templates" |
 * | RECORDKIT_MODELS_MODULES   | modelsModules    | []          |
 * | RECORDKIT_LOADERS_MODULE   | loadersModule    | built-in    |
 * | RECORDKIT_DUMPERS_MODULE   | dumpersModule    | built-in    |
 * | RECORDKIT_VALIDATION       | validationMode   | "strict"    |
 * | RECORDKIT_DEBUG            | debug            | false       |
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { ValidationMode } from "./types.js";

export interface RecordKitConfig {
  readonly templatesDir: string;
  readonly modelsModules: readonly string[];
  readonly loadersModule: string | undefined;
  readonly dumpersModule: string | undefined;
  readonly validationMode: ValidationMode;
  readonly debug: boolean;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const EnvSchema = z.object({
  RECORDKIT_TEMPLATES_DIR: z.string().trim().min(1, "must be a non-empty path").default("templates"),
  RECORDKIT_MODELS_MODULES: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item !== "")
    ),
  RECORDKIT_LOADERS_MODULE: optionalText,
  RECORDKIT_DUMPERS_MODULE: optionalText,
  RECORDKIT_VALIDATION: z.enum(["strict", "lenient"]).default("strict"),
  RECORDKIT_DEBUG: z
    .string()
    .default("")
    .refine((value) => ["", "0", "1", "true", "false"].includes(value.toLowerCase()), {
      message: 'must be one of "", "0", "1", "true", "false"',
    })
    .transform((value) => value === "1" || value.toLowerCase() === "true"),
});

/**
 * Parse configuration from an environment
 * @throws {ConfigError} Listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RecordKitConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join(", ")}`, { cause: result.error });
  }

  const parsed = result.data;
  return Object.freeze({
    templatesDir: parsed.RECORDKIT_TEMPLATES_DIR,
    modelsModules: Object.freeze(parsed.RECORDKIT_MODELS_MODULES),
    loadersModule: parsed.RECORDKIT_LOADERS_MODULE,
    dumpersModule: parsed.RECORDKIT_DUMPERS_MODULE,
    validationMode: parsed.RECORDKIT_VALIDATION,
    debug: parsed.RECORDKIT_DEBUG,
  });
}

let cached: RecordKitConfig | undefined;

/**
 * Configuration of this process, read once
 */
export function getConfig(): RecordKitConfig {
  cached ??= loadConfig(process.env);
  return cached;
}
