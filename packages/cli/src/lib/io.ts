/**
 * I/O seam for the CLI: where output goes and which environment is read
 */

import * as path from "node:path";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Whether stderr is an interactive terminal (enables color) */
  stderrIsTTY: boolean;
  env: NodeJS.ProcessEnv;
  /** Directory relative paths and module specifiers resolve against */
  cwd: string;
}

/**
 * The running process's streams and environment
 */
export function processIO(): CliIO {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    stderrIsTTY: process.stderr.isTTY ?? false,
    env: process.env,
    cwd: process.cwd(),
  };
}

/**
 * Resolve a user-supplied path against the CLI's working directory
 */
export function resolvePath(io: CliIO, filePath: string): string {
  return path.resolve(io.cwd, filePath);
}
