import { describe, expect, it } from "vitest";
import { chocoProfile, scoopProfile, wingetProfile } from "../src/managers.js";
import { classifyResult, NO_VERIFIER_MESSAGE } from "../src/services/resultClassifier.js";
import { summarizeOutput } from "../src/utils/text.js";

describe("classifyResult", () => {
  it("reports not-found when a choco marker is present, whatever the exit code", () => {
    expect(classifyResult(chocoProfile, "foo", 1, "0 packages found")).toEqual({
      status: "not-found",
      message: "Chocolatey reported no matching package. Output: 0 packages found"
    });
  });

  it("reports ok for a clean choco exit", () => {
    expect(classifyResult(chocoProfile, "foo", 0, "")).toEqual({
      status: "ok",
      message: "Chocolatey info located the package."
    });
  });

  it("reports error with a collapsed snippet on non-zero exit", () => {
    expect(classifyResult(chocoProfile, "foo", 2, "boom\n\n   source   unreachable\n")).toEqual({
      status: "error",
      message: "boom source unreachable"
    });
  });

  it("matches winget markers case-insensitively", () => {
    const result = classifyResult(wingetProfile, "Foo", 1, "No package found matching input criteria.");
    expect(result.status).toBe("not-found");
    expect(result.message).toBe(
      "winget reported no matching package. Output: No package found matching input criteria."
    );
  });

  it("accepts scoop output only when a line starts with the identifier", () => {
    const output = ["Results from local buckets...", "", "Name Version Source", "---- ------- ------", "git 2.45.1 main"].join(
      "\n"
    );
    expect(classifyResult(scoopProfile, "Git", 0, output)).toEqual({
      status: "ok",
      message: "Scoop search located the package."
    });
    expect(classifyResult(scoopProfile, "git", 0, "git(main)").status).toBe("ok");
    expect(classifyResult(scoopProfile, "git", 0, "  git  ").status).toBe("ok");
  });

  it("treats a scoop prefix match as not-found", () => {
    expect(classifyResult(scoopProfile, "git", 0, "gitui 0.26 extras")).toEqual({
      status: "not-found",
      message: "gitui 0.26 extras"
    });
  });

  it("treats blank scoop output as not-found", () => {
    expect(classifyResult(scoopProfile, "git", 0, "  \n")).toEqual({
      status: "not-found",
      message: "Scoop returned no search results. Output: "
    });
  });

  it("prefers the scoop marker over the exit code", () => {
    expect(classifyResult(scoopProfile, "git", 1, "Couldn't find manifest for 'git'.").status).toBe("not-found");
  });

  it("skips managers without a profile", () => {
    expect(classifyResult(undefined, "git", 0, "")).toEqual({ status: "skipped", message: NO_VERIFIER_MESSAGE });
  });
});

describe("summarizeOutput", () => {
  it("cuts long output at 200 characters with an ellipsis", () => {
    const snippet = summarizeOutput("a ".repeat(150));
    expect(snippet).toHaveLength(202);
    expect(snippet.endsWith("a...")).toBe(true);
  });

  it("returns short output collapsed but uncut", () => {
    expect(summarizeOutput("  one\ttwo \r\n three ")).toBe("one two three");
  });
});
