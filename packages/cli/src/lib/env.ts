/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { loadConfig, type RecordKitConfig } from "@recordkit/sdk";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

export interface ConfigOverrides {
  /** Model modules from --models; replace RECORDKIT_MODELS_MODULES when given */
  models?: readonly string[];
  /** Templates directory from --templates */
  templates?: string;
}

/**
 * Resolve the configuration
 * Priority: CLI option > RECORDKIT_* env var > default
 */
export function resolveConfig(env: NodeJS.ProcessEnv, overrides: ConfigOverrides = {}): RecordKitConfig {
  const config = loadConfig(env);
  const models = overrides.models && overrides.models.length > 0 ? overrides.models : config.modelsModules;
  const templatesDir = overrides.templates ?? config.templatesDir;

  return Object.freeze({
    ...config,
    modelsModules: models.map(expandTilde),
    templatesDir: expandTilde(templatesDir),
  });
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv): boolean {
  return env.RECORDKIT_CLI_DEBUG === "1";
}
