import { describe, expect, it } from "vitest";
import { CatalogError, CliError, formatFailure, formatSeconds } from "../src/errors.js";

describe("formatFailure", () => {
  it("includes the code of a CLI error", () => {
    expect(formatFailure(new CliError("INVALID_OPTION", "--timeout must be a positive integer, got 'x'"))).toBe(
      "catalog-audit failed [INVALID_OPTION]: --timeout must be a positive integer, got 'x'"
    );
  });

  it("prints other errors by message", () => {
    expect(formatFailure(new CatalogError("Package directory not found: /repo"))).toBe(
      "catalog-audit failed: Package directory not found: /repo"
    );
    expect(formatFailure("boom")).toBe("catalog-audit failed: boom");
  });
});

describe("formatSeconds", () => {
  it("drops the fraction for whole seconds", () => {
    expect(formatSeconds(25_000)).toBe("25");
    expect(formatSeconds(1500)).toBe("1.5");
  });
});
