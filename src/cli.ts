#!/usr/bin/env node
import { CliError, formatFailure } from "./errors.js";
import { createProgram } from "./program.js";

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(formatFailure(error));
  process.exit(error instanceof CliError ? error.exitCode : 1);
});
