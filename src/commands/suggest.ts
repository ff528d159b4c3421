import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Command } from "commander";
import {
  DEFAULT_FAILURES_FILE,
  DEFAULT_FIXES_FILE,
  DEFAULT_MAX_SUGGESTIONS,
  parseCount,
  resolveFrom,
  resolveRoot,
  resolveTimeoutMs
} from "../config.js";
import { CliError, errorMessage } from "../errors.js";
import { buildSuggestionReport, renderJson, renderSuggestionText, SuggestionReportRow } from "../report/renderers.js";
import { filterFailures, FixSuggester, parseCheckReport } from "../services/fixSuggester.js";
import { FailureRecord } from "../types.js";
import { collect, CommandContext, ContextFactory, contextFor } from "./context.js";

export interface SuggestOptions {
  input?: string;
  root?: string;
  manager: string[];
  packageId: string[];
  searchManager: string[];
  maxSuggestions?: string;
  timeout?: string;
  output?: string;
  stdout: boolean;
}

export async function runSuggest(options: SuggestOptions, context: CommandContext): Promise<number> {
  const { logger, out } = context;
  const root = resolveRoot(options.root);
  const inputPath = resolveFrom(root, options.input, DEFAULT_FAILURES_FILE);
  const outputPath = resolveFrom(root, options.output, DEFAULT_FIXES_FILE);
  const limit =
    options.maxSuggestions === undefined
      ? DEFAULT_MAX_SUGGESTIONS
      : parseCount(options.maxSuggestions, "--max-suggestions");
  const timeoutMs = resolveTimeoutMs(options.timeout);

  let content: string;
  try {
    content = await readFile(inputPath, "utf8");
  } catch {
    logger.error(`Input JSON not found: ${inputPath}`);
    return 1;
  }

  const records = filterFailures(readRecords(content, inputPath, root), {
    managers: options.manager,
    packageIds: options.packageId
  });
  if (records.length === 0) {
    out("No failing entries matched the provided filters.");
    return 0;
  }

  const suggester = new FixSuggester(context.runner, context.registry, logger);
  const managers = suggester.resolveSearchManagers(options.searchManager);
  logger.debug(`searching ${managers.join(", ")} for ${records.length} failing entries`);

  const payload: SuggestionReportRow[] = [];
  for (const record of records) {
    const result = await suggester.suggest(record, managers, timeoutMs);
    if (options.stdout) {
      out(renderSuggestionText(record, result, limit, context.registry));
    }
    payload.push(buildSuggestionReport(record, result, limit, context.registry));
  }

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, `${renderJson(payload)}\n`, "utf8");
  } catch (error) {
    logger.error(`Failed to write output JSON: ${errorMessage(error)}`);
    return 1;
  }

  out(
    options.stdout
      ? `Suggestion details also saved to ${outputPath} (${payload.length} records).`
      : `Wrote ${payload.length} suggestion records to ${outputPath}`
  );
  return 0;
}

function readRecords(content: string, inputPath: string, root: string): FailureRecord[] {
  try {
    return parseCheckReport(JSON.parse(content), root);
  } catch (error) {
    throw new CliError("INVALID_INPUT", `Malformed check report in ${inputPath}: ${errorMessage(error)}`);
  }
}

export function createSuggestCommand(factory: ContextFactory): Command {
  return new Command("suggest")
    .description("Search package managers for replacements of failing catalog entries")
    .option("--input <file>", `JSON written by 'check --format json' (default: <root>/${DEFAULT_FAILURES_FILE})`)
    .option("--root <dir>", "Repository root used to resolve relative paths")
    .option("--manager <manager>", "Only failing entries for this manager (repeatable)", collect, [])
    .option("--package-id <id>", "Only this catalog package id (repeatable)", collect, [])
    .option("--search-manager <manager>", "Only search this manager (repeatable)", collect, [])
    .option("--max-suggestions <n>", `Suggestions kept per entry (default: ${DEFAULT_MAX_SUGGESTIONS})`)
    .option("--timeout <seconds>", "Per-search timeout in seconds")
    .option("--output <file>", `Where to write suggestions (default: <root>/${DEFAULT_FIXES_FILE})`)
    .option("--no-stdout", "Do not print suggestion details")
    .action(async (options: SuggestOptions, command: Command) => {
      process.exitCode = await runSuggest(options, contextFor(command, factory));
    });
}
