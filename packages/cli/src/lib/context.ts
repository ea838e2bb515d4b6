/**
 * Shared state handed to every command
 */

import * as path from "node:path";
import type { Command } from "commander";
import { loadRecordKit, type RecordKit, type RecordType } from "@recordkit/sdk";
import { resolveConfig, isVerbose } from "./env.js";
import { CliError } from "./errors.js";
import type { CliIO } from "./io.js";

export interface GlobalOptions {
  models?: string[];
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliContext {
  program: Command;
  io: CliIO;
}

export function globalOptions(ctx: CliContext): GlobalOptions {
  return ctx.program.opts<GlobalOptions>();
}

/**
 * Verbose via --verbose or RECORDKIT_CLI_DEBUG=1
 */
export function verbose(ctx: CliContext): boolean {
  return Boolean(globalOptions(ctx).verbose) || isVerbose(ctx.io.env);
}

/**
 * Open a RecordKit from the environment and the global options
 */
export async function openCliKit(ctx: CliContext, options: { templates?: string } = {}): Promise<RecordKit> {
  const config = resolveConfig(ctx.io.env, { models: globalOptions(ctx).models, templates: options.templates });
  return loadRecordKit(
    { ...config, templatesDir: path.resolve(ctx.io.cwd, config.templatesDir) },
    { baseDir: ctx.io.cwd }
  );
}

/**
 * Find a registered record type by name or directive
 */
export function resolveType(kit: RecordKit, name: string): RecordType {
  const type = kit.registry.get(name) ?? kit.registry.directiveToType().get(name);
  if (!type) {
    const known = kit.registry.list().map((t) => t.name);
    throw new CliError(
      `Unknown record type "${name}". Registered types: ${known.length > 0 ? known.join(", ") : "(none; use --models)"}`
    );
  }
  return type;
}
