/**
 * `render`: print each record of a type through its template
 */

import { Command } from "commander";
import { collectAssignments } from "../lib/arg.js";
import { type CliContext, openCliKit, resolveType, verbose } from "../lib/context.js";
import { resolvePath } from "../lib/io.js";
import { withTiming } from "../lib/telemetry.js";

interface RenderOptions {
  templates?: string;
  var?: Record<string, string>;
}

export function createRenderCommand(ctx: CliContext): Command {
  return new Command("render")
    .description("Render every record of a type through its template")
    .argument("<type>", "Record type name or directive")
    .argument("<files...>", "Data files to ingest first")
    .option("--templates <dir>", "Templates directory (default: RECORDKIT_TEMPLATES_DIR or ./templates)")
    .option("--var <key=value>", "Extra template variable (repeatable)", collectAssignments("--var"))
    .addHelpText(
      "after",
      `
Examples:
  $ recordkit --models ./models.js render customers shop.yaml --templates ./templates
  $ recordkit --models ./models.js render ProductModel shop.yaml --var shop="Corner Store"`
    )
    .action(async (typeName: string, files: string[], options: RenderOptions) => {
      await withTiming(ctx.io, verbose(ctx), "cli.render", async () => {
        const kit = await openCliKit(ctx, { templates: options.templates });
        for (const file of files) {
          await kit.ingestFile(resolvePath(ctx.io, file));
        }

        const type = resolveType(kit, typeName);
        for (const record of kit.getAll(type)) {
          const text = kit.render(record, options.var ?? {});
          ctx.io.stdout(text.endsWith("\n") ? text : `${text}\n`);
        }
      });
    });
}
