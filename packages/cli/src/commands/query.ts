/**
 * `query`: print the records of one type matching a predicate
 */

import { Command } from "commander";
import { collectAssignments } from "../lib/arg.js";
import { type CliContext, openCliKit, resolveType, verbose } from "../lib/context.js";
import { resolvePath } from "../lib/io.js";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";
import { coerceWhere } from "../lib/where.js";

interface QueryOptions {
  where?: Record<string, string>;
  one?: boolean;
  raw?: boolean;
}

export function createQueryCommand(ctx: CliContext): Command {
  return new Command("query")
    .description("Print records of a type whose fields equal the given values")
    .argument("<type>", "Record type name or directive")
    .argument("<files...>", "Data files to ingest first")
    .option("--where <field=value>", "Field must equal value (repeatable)", collectAssignments("--where"))
    .option("--one", "Expect exactly one match (exit 2 when there is none)")
    .option("--raw", "Output compact JSON")
    .addHelpText(
      "after",
      `
Examples:
  $ recordkit --models ./models.js query products shop.yaml --where category=tools
  $ recordkit --models ./models.js query CustomerModel shop.yaml --where email=ann@example.com --one`
    )
    .action(async (typeName: string, files: string[], options: QueryOptions) => {
      await withTiming(ctx.io, verbose(ctx), "cli.query", async () => {
        const kit = await openCliKit(ctx);
        for (const file of files) {
          await kit.ingestFile(resolvePath(ctx.io, file));
        }

        const type = resolveType(kit, typeName);
        const where = coerceWhere(type, options.where ?? {});

        if (options.one) {
          printJson(ctx.io, kit.get(type, where).toPlain(), { raw: options.raw });
        } else {
          printJson(
            ctx.io,
            kit.filter(type, where).map((record) => record.toPlain()),
            { raw: options.raw }
          );
        }
      });
    });
}
