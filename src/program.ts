import { Command } from "commander";
import { createCheckCommand } from "./commands/check.js";
import { ContextFactory, defaultContextFactory } from "./commands/context.js";
import { createDuplicatesCommand } from "./commands/duplicates.js";
import { createSuggestCommand } from "./commands/suggest.js";
import { createTrimFixesCommand } from "./commands/trimFixes.js";

const VERSION = "0.1.0";

export function createProgram(factory: ContextFactory = defaultContextFactory): Command {
  const program = new Command();

  program
    .name("catalog-audit")
    .description("Audit package catalog entries against winget, Chocolatey and Scoop")
    .version(VERSION, "-V, --version", "Output the version number")
    .option("--verbose", "Print debug diagnostics to stderr")
    .addHelpText(
      "after",
      `
Examples:
  $ catalog-audit check --format json > failures.json
  $ catalog-audit suggest --search-manager winget --max-suggestions 5
  $ catalog-audit duplicates --strict
  $ catalog-audit trim-fixes 10
`
    );

  program.addCommand(createCheckCommand(factory));
  program.addCommand(createSuggestCommand(factory));
  program.addCommand(createDuplicatesCommand(factory));
  program.addCommand(createTrimFixesCommand(factory));

  return program;
}
