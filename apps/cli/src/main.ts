#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { parseEnv } from "@docquery/config";
import { createPipeline } from "@docquery/core";
import { createProgram } from "./program.js";

function loadEnv(): void {
  const explicitPath = process.env["DOTENV_CONFIG_PATH"];
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return;
  }

  const candidate = path.join(process.cwd(), ".env");
  if (fs.existsSync(candidate)) {
    dotenv.config({ path: candidate });
  }
}

loadEnv();

const program = createProgram({
  createPipeline: () => createPipeline(parseEnv(process.env)),
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
