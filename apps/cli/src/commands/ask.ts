import type { Command } from "commander";
import { formatAnswer } from "../format.js";
import { runCommand } from "../context.js";
import type { CliContext } from "../context.js";

interface AskOptions {
  sources?: boolean;
}

export function registerAskCommand(program: Command, context: CliContext): void {
  program
    .command("ask")
    .description("Answer a question from the indexed documents")
    .argument("<question...>", "the question")
    .option("--sources", "list the passages the answer was based on")
    .action(async (words: string[], options: AskOptions) => {
      await runCommand(context, async (pipeline) => {
        const result = await pipeline.rag.ask(words.join(" "));
        formatAnswer(result, options.sources ?? false).forEach(context.stdout);
      });
    });
}
