import { Command } from "commander";
import { DEFAULT_GLOB, resolveRoot } from "../config.js";
import { renderDuplicates } from "../report/renderers.js";
import { CatalogService } from "../services/catalogService.js";
import { collectDuplicates } from "../services/duplicateDetector.js";
import { CommandContext, ContextFactory, contextFor } from "./context.js";

export interface DuplicatesOptions {
  root?: string;
  glob: string;
  strict?: boolean;
}

export async function runDuplicates(options: DuplicatesOptions, context: CommandContext): Promise<number> {
  const catalog = new CatalogService(resolveRoot(options.root), options.glob);
  const files = await catalog.listCatalogFiles();
  if (files.length === 0) {
    context.logger.error("No package catalog files found.");
    return 1;
  }

  const duplicates = collectDuplicates(await catalog.loadPackageIds(files));
  if (duplicates.size === 0) {
    context.out("No duplicate package IDs detected.");
    return 0;
  }

  context.out("Duplicate package IDs detected:\n");
  context.out(renderDuplicates(duplicates, (filePath) => catalog.displayPath(filePath)));
  return options.strict ? 1 : 0;
}

export function createDuplicatesCommand(factory: ContextFactory): Command {
  return new Command("duplicates")
    .description("Report package ids declared more than once across catalog files")
    .option("--root <dir>", "Repository root containing data/catalog/packages")
    .option("--glob <pattern>", "Catalog file pattern", DEFAULT_GLOB)
    .option("--strict", "Exit with a non-zero status when duplicates are found")
    .action(async (options: DuplicatesOptions, command: Command) => {
      process.exitCode = await runDuplicates(options, contextFor(command, factory));
    });
}
