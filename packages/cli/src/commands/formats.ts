/**
 * `formats`: list the formats the configured codecs read and write
 */

import { Command } from "commander";
import { loadCodecTable, loadConfig } from "@recordkit/sdk";
import { type CliContext, verbose } from "../lib/context.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface FormatsOptions {
  json?: boolean;
}

export function createFormatsCommand(ctx: CliContext): Command {
  return new Command("formats")
    .description("List supported file formats")
    .option("--json", "Output loader and dumper formats as JSON")
    .action(async (options: FormatsOptions) => {
      await withTiming(ctx.io, verbose(ctx), "cli.formats", async () => {
        const config = loadConfig(ctx.io.env);
        const codecs = await loadCodecTable({
          loadersModule: config.loadersModule,
          dumpersModule: config.dumpersModule,
          baseDir: ctx.io.cwd,
        });

        if (options.json) {
          printJson(ctx.io, { load: codecs.supportedFormats(), dump: codecs.dumpFormats() });
        } else {
          printLines(ctx.io, codecs.supportedFormats());
        }
      });
    });
}
