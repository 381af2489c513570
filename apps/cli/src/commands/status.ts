import type { Command } from "commander";
import { formatStatus } from "../format.js";
import { runCommand } from "../context.js";
import type { CliContext } from "../context.js";

export function registerStatusCommand(program: Command, context: CliContext): void {
  program
    .command("status")
    .description("Show whether the collection exists and how it was built")
    .action(async () => {
      await runCommand(context, async (pipeline) => {
        formatStatus(await pipeline.ingestion.status()).forEach(context.stdout);
      });
    });
}
