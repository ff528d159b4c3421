import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CatalogError } from "../src/errors.js";
import { CatalogService, filterEntries } from "../src/services/catalogService.js";
import { entry } from "./support/entries.js";

describe("CatalogService", () => {
  let root: string;
  let dir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "catalog-audit-"));
    dir = join(root, "data", "catalog", "packages");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "b.yml"), "packages:\n  - id: b\n    manager: scoop\n");
    await writeFile(join(dir, "a.yml"), "packages:\n  - id: a\n    manager: winget\n");
    await writeFile(join(dir, ".hidden.yml"), "packages:\n  - id: h\n    manager: winget\n");
    await writeFile(join(dir, "notes.txt"), "not a catalog\n");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists matching files in sorted order without hidden ones", async () => {
    const service = new CatalogService(root);

    expect(service.getCatalogDir()).toBe(dir);
    await expect(service.listCatalogFiles()).resolves.toEqual([join(dir, "a.yml"), join(dir, "b.yml")]);
    await expect(new CatalogService(root, "*.txt").listCatalogFiles()).resolves.toEqual([join(dir, "notes.txt")]);
  });

  it("supports character classes and explicit dot patterns", async () => {
    await writeFile(join(dir, "c.yml"), "packages: []\n");

    await expect(new CatalogService(root, "[ac]*.yml").listCatalogFiles()).resolves.toEqual([
      join(dir, "a.yml"),
      join(dir, "c.yml")
    ]);
    await expect(new CatalogService(root, "?.yml").listCatalogFiles()).resolves.toEqual([
      join(dir, "a.yml"),
      join(dir, "b.yml"),
      join(dir, "c.yml")
    ]);
    await expect(new CatalogService(root, ".*.yml").listCatalogFiles()).resolves.toEqual([join(dir, ".hidden.yml")]);
  });

  it("loads entries file by file and totals the skipped records", async () => {
    await writeFile(join(dir, "b.yml"), "packages:\n  - id: b\n    manager: scoop\n  - id: orphan\n");
    const service = new CatalogService(root);
    const loaded = await service.loadEntries(await service.listCatalogFiles());

    expect(loaded.entries.map((item) => [item.packageId, item.filePath])).toEqual([
      ["a", join(dir, "a.yml")],
      ["b", join(dir, "b.yml")]
    ]);
    expect(loaded.skipped).toBe(1);
  });

  it("loads every id-bearing record for duplicate detection", async () => {
    await writeFile(join(dir, "b.yml"), "packages:\n  - manager: scoop\n  - id: orphan\n  - id: b\n    manager: scoop\n");
    const service = new CatalogService(root);

    await expect(service.loadPackageIds(await service.listCatalogFiles())).resolves.toEqual([
      { packageId: "a", filePath: join(dir, "a.yml"), index: 1 },
      { packageId: "orphan", filePath: join(dir, "b.yml"), index: 1 },
      { packageId: "b", filePath: join(dir, "b.yml"), index: 2 }
    ]);
  });

  it("fails when the package directory is missing", async () => {
    const service = new CatalogService(join(root, "elsewhere"));
    await expect(service.listCatalogFiles()).rejects.toThrow(CatalogError);
  });

  it("shows paths under the root relative to it", () => {
    const service = new CatalogService(root);

    expect(service.displayPath(join(dir, "a.yml"))).toBe(join("data", "catalog", "packages", "a.yml"));
    expect(service.displayPath(join(tmpdir(), "outside.yml"))).toBe(join(tmpdir(), "outside.yml"));
  });
});

describe("filterEntries", () => {
  const entries = [
    entry({ packageId: "Git", manager: "winget" }),
    entry({ packageId: "7zip", manager: "choco" }),
    entry({ packageId: "jq", manager: "scoop" })
  ];

  it("returns everything without filters", () => {
    expect(filterEntries(entries, {})).toHaveLength(3);
  });

  it("matches managers and package ids case-insensitively", () => {
    expect(filterEntries(entries, { managers: ["CHOCO", "scoop"] }).map((item) => item.packageId)).toEqual([
      "7zip",
      "jq"
    ]);
    expect(filterEntries(entries, { packageIds: ["git"] }).map((item) => item.packageId)).toEqual(["Git"]);
    expect(filterEntries(entries, { managers: ["winget"], packageIds: ["jq"] })).toEqual([]);
  });
});
