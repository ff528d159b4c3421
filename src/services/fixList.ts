import { readFile, writeFile } from "node:fs/promises";
import { errorMessage, FixListError } from "../errors.js";

export async function loadFixes(path: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    throw new FixListError(`Cannot find fixes file at ${path}: ${errorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new FixListError(`Invalid JSON in ${path}: ${errorMessage(error)}`);
  }

  if (!Array.isArray(data)) {
    throw new FixListError(`Expected top-level JSON array in ${path}`);
  }
  return data;
}

export async function saveFixes(path: string, fixes: readonly unknown[]): Promise<void> {
  await writeFile(path, `${JSON.stringify(fixes, null, 2)}\n`, "utf8");
}

/** Drops the first `count` fixes once they have been applied to the catalog. */
export function trimFixes<T>(fixes: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [...fixes];
  }
  if (count > fixes.length) {
    throw new FixListError(`Requested removal of ${count} entries but only ${fixes.length} remain`);
  }
  return fixes.slice(count);
}
