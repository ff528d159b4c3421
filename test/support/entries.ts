import { CatalogEntry } from "../../src/types.js";

export function entry(overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    packageId: "Foo",
    manager: "winget",
    command: "winget install --id Foo --exact",
    name: "",
    filePath: "data/catalog/packages/dev.yml",
    index: 1,
    ...overrides
  };
}
