import { resolve } from "node:path";
import { Command } from "commander";
import { DEFAULT_FIXES_FILE, DEFAULT_TRIM_COUNT, parseCount } from "../config.js";
import { loadFixes, saveFixes, trimFixes } from "../services/fixList.js";
import { CommandContext, ContextFactory, contextFor } from "./context.js";

export interface TrimFixesOptions {
  fixes: string;
}

export async function runTrimFixes(
  count: number,
  options: TrimFixesOptions,
  context: CommandContext
): Promise<number> {
  const path = resolve(process.cwd(), options.fixes);
  const fixes = await loadFixes(path);
  const trimmed = trimFixes(fixes, count);

  if (trimmed.length === fixes.length) {
    context.out("No entries removed; nothing to do.");
    return 0;
  }

  await saveFixes(path, trimmed);
  context.out(`Removed ${count} entries. Remaining: ${trimmed.length}`);
  return 0;
}

export function createTrimFixesCommand(factory: ContextFactory): Command {
  return new Command("trim-fixes")
    .description("Remove the first N entries from the fix list once they are resolved")
    .argument("[count]", "Number of leading fixes to remove", String(DEFAULT_TRIM_COUNT))
    .option("--fixes <file>", "Path to the fix list", DEFAULT_FIXES_FILE)
    .action(async (count: string, options: TrimFixesOptions, command: Command) => {
      process.exitCode = await runTrimFixes(parseCount(count, "count"), options, contextFor(command, factory));
    });
}
