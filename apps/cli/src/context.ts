import type { Pipeline } from "@docquery/core";
import { AppError, describeError } from "@docquery/errors";

export interface CliContext {
  /** Builds the pipeline on first use so `--help` never reads the environment. */
  createPipeline: () => Pipeline;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  setExitCode: (code: number) => void;
}

/**
 * Run one command against a fresh pipeline. Failures print a single
 * `Error:` line and set exit code 1.
 */
export async function runCommand(
  context: CliContext,
  action: (pipeline: Pipeline) => Promise<void>,
): Promise<void> {
  let pipeline: Pipeline | undefined;
  try {
    pipeline = context.createPipeline();
    await action(pipeline);
  } catch (error: unknown) {
    if (!(error instanceof AppError)) {
      pipeline?.logger.error({ err: error }, "command failed");
    }
    context.stderr(`Error: ${describeError(error)}`);
    context.setExitCode(1);
  } finally {
    pipeline?.close();
  }
}
