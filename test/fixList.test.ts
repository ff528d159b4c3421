import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FixListError } from "../src/errors.js";
import { loadFixes, saveFixes, trimFixes } from "../src/services/fixList.js";

describe("trimFixes", () => {
  it("drops entries from the front", () => {
    expect(trimFixes(["a", "b", "c"], 2)).toEqual(["c"]);
    expect(trimFixes(["a", "b"], 2)).toEqual([]);
  });

  it("leaves the list alone for a zero count", () => {
    const fixes = ["a"];
    const trimmed = trimFixes(fixes, 0);
    expect(trimmed).toEqual(["a"]);
    expect(trimmed).not.toBe(fixes);
  });

  it("refuses to remove more than remain", () => {
    expect(() => trimFixes(["a"], 3)).toThrow(
      new FixListError("Requested removal of 3 entries but only 1 remain")
    );
  });
});

describe("fix list files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "catalog-audit-fixes-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("round-trips the list with two-space indentation", async () => {
    const path = join(dir, "fixes.json");
    await saveFixes(path, [{ package_id: "git" }]);

    expect(await readFile(path, "utf8")).toBe('[\n  {\n    "package_id": "git"\n  }\n]\n');
    await expect(loadFixes(path)).resolves.toEqual([{ package_id: "git" }]);
  });

  it("rejects a missing file, bad JSON and a non-array document", async () => {
    await expect(loadFixes(join(dir, "missing.json"))).rejects.toThrow(/^Cannot find fixes file at /);

    const broken = join(dir, "broken.json");
    await writeFile(broken, "{");
    await expect(loadFixes(broken)).rejects.toThrow(/^Invalid JSON in /);

    const object = join(dir, "object.json");
    await writeFile(object, '{"a": 1}');
    await expect(loadFixes(object)).rejects.toThrow(`Expected top-level JSON array in ${object}`);
  });
});
