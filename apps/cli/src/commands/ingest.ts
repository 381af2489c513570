import type { Command } from "commander";
import { resolveSources } from "@docquery/loader";
import { formatIngestion } from "../format.js";
import { runCommand } from "../context.js";
import type { CliContext } from "../context.js";

interface IngestOptions {
  rebuild?: boolean;
}

async function ingest(context: CliContext, paths: string[], rebuild: boolean): Promise<void> {
  await runCommand(context, async (pipeline) => {
    const sources = await resolveSources(paths);
    const result = await pipeline.ingestion.build(sources, { rebuild });
    formatIngestion(result).forEach(context.stdout);
  });
}

export function registerIngestCommands(program: Command, context: CliContext): void {
  program
    .command("ingest")
    .description("Index files and directories into the collection (once)")
    .argument("<paths...>", "files or directories to index")
    .option("--rebuild", "drop and re-index an existing collection")
    .action(async (paths: string[], options: IngestOptions) => {
      await ingest(context, paths, options.rebuild ?? false);
    });

  program
    .command("rebuild")
    .description("Drop the collection and index the given paths again")
    .argument("<paths...>", "files or directories to index")
    .action(async (paths: string[]) => {
      await ingest(context, paths, true);
    });

  program
    .command("refresh")
    .description("Replace the records of one source")
    .argument("<path>", "file to re-index")
    .action(async (source: string) => {
      await runCommand(context, async (pipeline) => {
        const result = await pipeline.ingestion.refreshSource(source);
        context.stdout(
          `Refreshed ${source}: ${String(result.chunkCount)} chunks (${String(result.tokensUsed)} tokens).`,
        );
      });
    });
}
