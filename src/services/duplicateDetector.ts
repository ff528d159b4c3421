import { PackageOccurrence } from "../types.js";

export type DuplicateMap = Map<string, PackageOccurrence[]>;

/** Package ids declared more than once, keyed by id in sorted order. */
export function collectDuplicates(found: readonly PackageOccurrence[]): DuplicateMap {
  const occurrences = new Map<string, PackageOccurrence[]>();
  for (const { packageId, filePath, index } of found) {
    const list = occurrences.get(packageId) ?? [];
    list.push({ packageId, filePath, index });
    occurrences.set(packageId, list);
  }

  const duplicates: DuplicateMap = new Map();
  for (const packageId of [...occurrences.keys()].sort()) {
    const list = occurrences.get(packageId) ?? [];
    if (list.length > 1) {
      duplicates.set(packageId, list);
    }
  }
  return duplicates;
}
