import { parse } from "yaml";
import { z } from "zod";
import { CatalogError, errorMessage } from "../errors.js";
import { CatalogEntry, PackageOccurrence, ParsedCatalog } from "../types.js";

const scalar = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

const PackageRecordSchema = z
  .object({
    id: scalar,
    manager: scalar,
    command: scalar,
    name: scalar
  })
  .passthrough();

const PackageIdSchema = z.object({ id: scalar }).passthrough();

const CatalogDocumentSchema = z
  .object({
    packages: z.array(z.unknown()).nullish()
  })
  .passthrough();

/**
 * Reads one catalog document. Records that are not mappings or that lack an
 * `id` or `manager` are skipped; `index` still counts them so that it points
 * at the record's position in the file.
 */
export function parseCatalog(content: string, filePath: string): ParsedCatalog {
  const entries: CatalogEntry[] = [];
  let skipped = 0;

  readPackageList(content, filePath).forEach((item, i) => {
    const record = PackageRecordSchema.safeParse(item);
    if (!record.success || !record.data.id || !record.data.manager) {
      skipped += 1;
      return;
    }

    entries.push({
      packageId: record.data.id,
      manager: record.data.manager,
      command: record.data.command,
      name: record.data.name,
      filePath,
      index: i + 1
    });
  });

  return { entries, skipped };
}

/**
 * Every record that declares an `id`, whatever else it lacks. `index` counts
 * only those records.
 */
export function readPackageIds(content: string, filePath: string): PackageOccurrence[] {
  const occurrences: PackageOccurrence[] = [];

  for (const item of readPackageList(content, filePath)) {
    const record = PackageIdSchema.safeParse(item);
    if (record.success && record.data.id) {
      occurrences.push({ packageId: record.data.id, filePath, index: occurrences.length + 1 });
    }
  }

  return occurrences;
}

function readPackageList(content: string, filePath: string): unknown[] {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new CatalogError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`);
  }

  if (raw === null || raw === undefined) {
    return [];
  }

  const document = CatalogDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new CatalogError(`Expected a mapping with a 'packages' list in ${filePath}`);
  }

  return document.data.packages ?? [];
}
