/**
 * `convert`: rewrite a data file in another format
 */

import { Command } from "commander";
import { convertedPath, loadCodecTable, loadConfig } from "@recordkit/sdk";
import { parseFormat } from "../lib/arg.js";
import { type CliContext, globalOptions, verbose } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import { resolvePath } from "../lib/io.js";
import { withTiming } from "../lib/telemetry.js";

interface ConvertCommandOptions {
  to: string;
  out?: string;
  stdout?: boolean;
}

export function createConvertCommand(ctx: CliContext): Command {
  return new Command("convert")
    .description("Convert a data file to another format")
    .argument("<src>", "Source file; its extension selects the loader")
    .requiredOption("--to <format>", "Target format", parseFormat)
    .option("--out <file>", "Destination file (default: beside the source, with the new extension)")
    .option("--stdout", "Print the converted text instead of writing a file")
    .addHelpText(
      "after",
      `
Examples:
  $ recordkit convert shop.yaml --to json
  $ recordkit convert settings.ini --to toml --out config/settings.toml
  $ recordkit convert shop.json --to yaml --stdout`
    )
    .action(async (src: string, options: ConvertCommandOptions) => {
      await withTiming(ctx.io, verbose(ctx), "cli.convert", async () => {
        if (options.stdout && options.out) {
          throw new CliError("Cannot use both --out and --stdout");
        }

        const config = loadConfig(ctx.io.env);
        const codecs = await loadCodecTable({
          loadersModule: config.loadersModule,
          dumpersModule: config.dumpersModule,
          baseDir: ctx.io.cwd,
        });

        const srcFile = resolvePath(ctx.io, src);
        const dstFile = options.out ? resolvePath(ctx.io, options.out) : convertedPath(srcFile, options.to);
        const text = await codecs.convertFile(srcFile, options.to, { dstFile, save: !options.stdout });

        if (options.stdout) {
          ctx.io.stdout(text);
        } else if (!globalOptions(ctx).quiet) {
          ctx.io.stdout(`✓ Converted ${src} -> ${dstFile}\n`);
        }
      });
    });
}
