import { readdir, readFile, stat } from "node:fs/promises";
import { isAbsolute, join, relative } from "node:path";
import { minimatch } from "minimatch";
import { CATALOG_DIR, DEFAULT_GLOB } from "../config.js";
import { CatalogError, errorMessage } from "../errors.js";
import { parseCatalog, readPackageIds } from "../parser/catalogParser.js";
import { CatalogEntry, PackageOccurrence, ParsedCatalog } from "../types.js";

export interface EntryFilters {
  managers?: readonly string[];
  packageIds?: readonly string[];
}

export class CatalogService {
  constructor(
    private readonly root: string,
    private readonly glob = DEFAULT_GLOB
  ) {}

  getCatalogDir(): string {
    return join(this.root, ...CATALOG_DIR);
  }

  async listCatalogFiles(): Promise<string[]> {
    const dir = this.getCatalogDir();
    let names: string[];
    try {
      if (!(await stat(dir)).isDirectory()) {
        throw new CatalogError(`Package directory not found: ${dir}`);
      }
      names = await readdir(dir);
    } catch (error) {
      if (error instanceof CatalogError) {
        throw error;
      }
      throw new CatalogError(`Package directory not found: ${dir} (${errorMessage(error)})`);
    }

    return names
      .filter((name) => minimatch(name, this.glob, { dot: false }))
      .sort()
      .map((name) => join(dir, name));
  }

  async loadEntries(files: readonly string[]): Promise<ParsedCatalog> {
    const entries: CatalogEntry[] = [];
    let skipped = 0;
    for (const file of files) {
      const parsed = parseCatalog(await readCatalogFile(file), file);
      entries.push(...parsed.entries);
      skipped += parsed.skipped;
    }
    return { entries, skipped };
  }

  /** Every id-bearing record, including those `loadEntries` would skip. */
  async loadPackageIds(files: readonly string[]): Promise<PackageOccurrence[]> {
    const occurrences: PackageOccurrence[] = [];
    for (const file of files) {
      occurrences.push(...readPackageIds(await readCatalogFile(file), file));
    }
    return occurrences;
  }

  /** Path shown in reports: relative to the root when the file lives under it. */
  displayPath(filePath: string): string {
    const rel = relative(this.root, filePath);
    return rel && !rel.startsWith("..") && !isAbsolute(rel) ? rel : filePath;
  }
}

export function filterEntries(entries: readonly CatalogEntry[], filters: EntryFilters): CatalogEntry[] {
  const managers = lowerSet(filters.managers);
  const packageIds = lowerSet(filters.packageIds);

  return entries.filter(
    (entry) =>
      (managers.size === 0 || managers.has(entry.manager.toLowerCase())) &&
      (packageIds.size === 0 || packageIds.has(entry.packageId.toLowerCase()))
  );
}

export function lowerSet(values: readonly string[] = []): Set<string> {
  return new Set(values.filter(Boolean).map((value) => value.toLowerCase()));
}

async function readCatalogFile(file: string): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch (error) {
    throw new CatalogError(`Unable to read catalog file ${file}: ${errorMessage(error)}`);
  }
}
