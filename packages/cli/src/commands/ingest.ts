/**
 * `ingest`: load data files into a store and print its export
 */

import { Command } from "commander";
import { parseFormat } from "../lib/arg.js";
import { type CliContext, openCliKit, verbose } from "../lib/context.js";
import { resolvePath } from "../lib/io.js";
import { withTiming } from "../lib/telemetry.js";

interface IngestOptions {
  format: string;
}

export function createIngestCommand(ctx: CliContext): Command {
  return new Command("ingest")
    .description("Ingest data files through the registered record types and print the store")
    .argument("<files...>", "Data files, ingested in order into one store")
    .option("--format <format>", "Output format", parseFormat, "json")
    .addHelpText(
      "after",
      `
Examples:
  $ recordkit --models ./models.js ingest products.yaml customers.json
  $ RECORDKIT_MODELS_MODULES=./models.js recordkit ingest shop.toml --format yaml`
    )
    .action(async (files: string[], options: IngestOptions) => {
      await withTiming(ctx.io, verbose(ctx), "cli.ingest", async () => {
        const kit = await openCliKit(ctx);
        for (const file of files) {
          await kit.ingestFile(resolvePath(ctx.io, file));
        }
        ctx.io.stdout(kit.dump(options.format));
      });
    });
}
