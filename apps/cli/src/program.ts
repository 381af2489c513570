import { Command } from "commander";
import type { CliContext } from "./context.js";
import { registerIngestCommands } from "./commands/ingest.js";
import { registerAskCommand } from "./commands/ask.js";
import { registerStatusCommand } from "./commands/status.js";

export function createProgram(context: CliContext): Command {
  const program = new Command();
  program
    .name("docquery")
    .description("Ask questions about a local document collection")
    .version("0.1.0");

  registerIngestCommands(program, context);
  registerAskCommand(program, context);
  registerStatusCommand(program, context);

  return program;
}
