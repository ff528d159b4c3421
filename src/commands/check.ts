import { Command, Option } from "commander";
import { DEFAULT_GLOB, resolveRoot, resolveTimeoutMs } from "../config.js";
import { buildCheckReport, renderCheckTable, renderJson } from "../report/renderers.js";
import { AvailabilityChecker, hasFailures } from "../services/availabilityChecker.js";
import { CatalogService, filterEntries } from "../services/catalogService.js";
import { collect, CommandContext, ContextFactory, contextFor } from "./context.js";

export interface CheckOptions {
  root?: string;
  glob: string;
  format: "table" | "json";
  manager: string[];
  packageId: string[];
  timeout?: string;
  strict?: boolean;
}

/**
 * Verifies every selected catalog entry against its manager's CLI and
 * returns the process exit code.
 */
export async function runCheck(options: CheckOptions, context: CommandContext): Promise<number> {
  const { logger, out } = context;
  const root = resolveRoot(options.root);
  const timeoutMs = resolveTimeoutMs(options.timeout);
  const catalog = new CatalogService(root, options.glob);

  const files = await catalog.listCatalogFiles();
  if (files.length === 0) {
    logger.error("No catalog files matched the provided glob.");
    return 1;
  }

  const loaded = await catalog.loadEntries(files);
  if (loaded.skipped > 0) {
    logger.debug(`skipped ${loaded.skipped} catalog records without an id or manager`);
  }

  const entries = filterEntries(loaded.entries, {
    managers: options.manager,
    packageIds: options.packageId
  });
  if (entries.length === 0) {
    out("No catalog entries matched the provided filters.");
    return 0;
  }

  logger.debug(`checking ${entries.length} entries from ${files.length} files under ${root}`);
  const showProgress = options.format === "table";
  const checker = new AvailabilityChecker(context.runner, context.registry);
  const outcomes = await checker.checkAll(entries, {
    timeoutMs,
    onProgress: ({ position, total, entry, outcome }) => {
      if (!showProgress) {
        return;
      }
      const prefix = `[${position}/${total}]`;
      logger.info(
        outcome
          ? `${prefix} ${entry.packageId} -> ${outcome.status.toUpperCase()}`
          : `${prefix} Checking ${entry.packageId} (${entry.manager})...`
      );
    }
  });

  const formatPath = (filePath: string) => catalog.displayPath(filePath);
  out(
    options.format === "json"
      ? renderJson(buildCheckReport(outcomes, formatPath))
      : renderCheckTable(outcomes, formatPath)
  );

  return hasFailures(outcomes, options.strict) ? 1 : 0;
}

export function createCheckCommand(factory: ContextFactory): Command {
  return new Command("check")
    .description("Verify that catalog entries resolve with their package manager")
    .option("--root <dir>", "Repository root containing data/catalog/packages")
    .option("--glob <pattern>", "Catalog file pattern", DEFAULT_GLOB)
    .addOption(new Option("--format <format>", "Output format").choices(["table", "json"]).default("table"))
    .option("--manager <manager>", "Only check entries for this manager (repeatable)", collect, [])
    .option("--package-id <id>", "Only check this catalog package id (repeatable)", collect, [])
    .option("--timeout <seconds>", "Per-package timeout in seconds")
    .option("--strict", "Treat skipped entries as failures")
    .action(async (options: CheckOptions, command: Command) => {
      process.exitCode = await runCheck(options, contextFor(command, factory));
    });
}
