/**
 * recordkit command line: program definition
 */

import { Command, CommanderError } from "commander";
import { VERSION } from "@recordkit/sdk";
import { createConvertCommand } from "./commands/convert.js";
import { createFormatsCommand } from "./commands/formats.js";
import { createIngestCommand } from "./commands/ingest.js";
import { createQueryCommand } from "./commands/query.js";
import { createRenderCommand } from "./commands/render.js";
import { collectList } from "./lib/arg.js";
import { type CliContext, verbose } from "./lib/context.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { processIO, type CliIO } from "./lib/io.js";
import { colorize } from "./lib/render.js";

/**
 * Build the command tree
 * Commander errors are thrown rather than exiting, so runCli decides the exit code.
 */
export function createProgram(io: CliIO = processIO()): Command {
  const program = new Command();
  const ctx: CliContext = { program, io };

  program
    .name("recordkit")
    .description("recordkit - typed records from JSON, YAML, TOML and INI files")
    .version(VERSION)
    .option("--models <modules>", "Record type modules, comma-separated or repeated (default: RECORDKIT_MODELS_MODULES)", collectList)
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(colorize(str, "red", io.stderrIsTTY)),
    })
    .exitOverride();

  program.addCommand(createFormatsCommand(ctx));
  program.addCommand(createConvertCommand(ctx));
  program.addCommand(createIngestCommand(ctx));
  program.addCommand(createQueryCommand(ctx));
  program.addCommand(createRenderCommand(ctx));

  // Subcommands inherit the output and exit handling of the program
  for (const command of program.commands) {
    command.configureOutput(program.configureOutput()).exitOverride();
  }

  return program;
}

/**
 * Run the CLI
 * @param argv - Full argument vector, as in process.argv
 * @returns The exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO()): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    const exitCode = mapErrorToExitCode(err);

    // Commander already printed its own message (usage errors, help, version)
    if (!(err instanceof CommanderError)) {
      const message = formatCliError(err, verbose({ program, io }));
      io.stderr(colorize(`Error: ${message}`, "red", io.stderrIsTTY) + "\n");
    }

    return exitCode;
  }
}
