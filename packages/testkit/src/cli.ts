/**
 * CLI testing utilities
 */

/**
 * Streams and environment handed to the CLI in place of the process's
 */
export interface CapturedIO {
  stdout(text: string): void;
  stderr(text: string): void;
  stderrIsTTY: boolean;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

/**
 * Captured output of a CLI run
 */
export interface CliCapture {
  io: CapturedIO;
  /** Everything written to stdout so far */
  stdout(): string;
  /** Everything written to stderr so far */
  stderr(): string;
}

/**
 * Build an I/O seam that records output in memory
 * @param options - Working directory and environment (default: the process cwd, an empty environment)
 */
export function captureIO(options: { cwd?: string; env?: Record<string, string> } = {}): CliCapture {
  const out: string[] = [];
  const err: string[] = [];

  return {
    io: {
      stdout: (text) => {
        out.push(text);
      },
      stderr: (text) => {
        err.push(text);
      },
      stderrIsTTY: false,
      env: { ...options.env },
      cwd: options.cwd ?? process.cwd(),
    },
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}
