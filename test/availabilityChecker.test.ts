import { describe, expect, it } from "vitest";
import { CommandLaunchError, CommandTimeoutError } from "../src/errors.js";
import { createDefaultRegistry } from "../src/managers.js";
import { AvailabilityChecker, CheckProgress, hasFailures } from "../src/services/availabilityChecker.js";
import { CheckOutcome } from "../src/types.js";
import { entry } from "./support/entries.js";
import { failed, FakeRunner, ok } from "./support/fakeRunner.js";

const registry = createDefaultRegistry();

describe("AvailabilityChecker", () => {
  it("maps a winget entry to winget show --exact", async () => {
    const runner = new FakeRunner(() => ok("Found Foo [Foo]"));
    const checker = new AvailabilityChecker(runner, registry);

    const outcome = await checker.check(entry({ command: "winget install Foo" }), 25_000);

    expect(runner.calls).toEqual([
      {
        cmd: "winget",
        args: ["show", "--id", "Foo", "--exact", "--disable-interactivity", "--source", "winget"],
        options: { timeoutMs: 25_000 }
      }
    ]);
    expect(outcome).toMatchObject({
      managerIdentifier: "Foo",
      status: "ok",
      message: "winget show located the package.",
      returnCode: 0
    });
  });

  it("classifies a winget miss as not-found", async () => {
    const runner = new FakeRunner(() => failed(1, "No package found matching input criteria."));
    const checker = new AvailabilityChecker(runner, registry);

    const outcome = await checker.check(entry({ command: "install --id Foo --exact" }), 25_000);

    expect(outcome.status).toBe("not-found");
    expect(outcome.message).toContain("No package found matching input criteria.");
    expect(outcome.returnCode).toBe(1);
  });

  it("uses choco search for chocolatey entries and reads stderr", async () => {
    const runner = new FakeRunner(() => failed(1, "", "0 packages found."));
    const checker = new AvailabilityChecker(runner, registry);

    const outcome = await checker.check(entry({ manager: "chocolatey", command: "choco install 7zip -y" }), 5000);

    expect(runner.calls[0]).toMatchObject({
      cmd: "choco",
      args: ["search", "7zip", "--exact", "--limit-output", "--id-only"]
    });
    expect(outcome.status).toBe("not-found");
  });

  it("skips unknown managers without running anything", async () => {
    const runner = new FakeRunner(() => ok(""));
    const checker = new AvailabilityChecker(runner, registry);

    const outcome = await checker.check(entry({ manager: "apt", command: "apt install git" }), 5000);

    expect(runner.calls).toHaveLength(0);
    expect(outcome).toEqual({
      entry: entry({ manager: "apt", command: "apt install git" }),
      status: "skipped",
      message: "No CLI mapping registered for manager 'apt'."
    });
  });

  it("skips entries whose command yields no identifier", async () => {
    const runner = new FakeRunner(() => ok(""));
    const checker = new AvailabilityChecker(runner, registry);

    const outcome = await checker.check(entry({ manager: "choco", command: "choco" }), 5000);

    expect(runner.calls).toHaveLength(0);
    expect(outcome.status).toBe("skipped");
    expect(outcome.message).toBe("Unable to determine manager-specific identifier from command.");
  });

  it("reports a missing CLI as an error", async () => {
    const runner = new FakeRunner(() => new CommandLaunchError("scoop"));
    const checker = new AvailabilityChecker(runner, registry);

    const outcome = await checker.check(entry({ manager: "scoop", command: "scoop install git" }), 5000);

    expect(outcome).toMatchObject({
      managerIdentifier: "git",
      status: "error",
      message: "Failed to start 'scoop'. Ensure it is installed."
    });
    expect(outcome.returnCode).toBeUndefined();
  });

  it("reports a timeout as an error", async () => {
    const runner = new FakeRunner(() => new CommandTimeoutError("winget", 25_000));
    const checker = new AvailabilityChecker(runner, registry);

    const outcome = await checker.check(entry(), 25_000);

    expect(outcome.status).toBe("error");
    expect(outcome.message).toBe("Verification command exceeded the 25s timeout.");
  });

  it("checks entries in order and reports progress around each check", async () => {
    const runner = new FakeRunner((_cmd, args) =>
      args.includes("Missing") ? failed(1, "No package found matching input criteria.") : ok("Found")
    );
    const checker = new AvailabilityChecker(runner, registry);
    const progress: CheckProgress[] = [];

    const outcomes = await checker.checkAll(
      [entry({ packageId: "a", command: "winget install Present" }), entry({ packageId: "b", command: "winget install Missing" })],
      { timeoutMs: 1000, onProgress: (event) => progress.push(event) }
    );

    expect(outcomes.map((outcome) => [outcome.entry.packageId, outcome.status])).toEqual([
      ["a", "ok"],
      ["b", "not-found"]
    ]);
    expect(progress.map((event) => [event.position, event.total, event.outcome?.status])).toEqual([
      [1, 2, undefined],
      [1, 2, "ok"],
      [2, 2, undefined],
      [2, 2, "not-found"]
    ]);
  });
});

describe("hasFailures", () => {
  const outcome = (status: CheckOutcome["status"]): CheckOutcome => ({ entry: entry(), status, message: "" });

  it("fails on not-found and error", () => {
    expect(hasFailures([outcome("ok"), outcome("error")])).toBe(true);
    expect(hasFailures([outcome("ok"), outcome("not-found")])).toBe(true);
    expect(hasFailures([outcome("ok"), outcome("skipped")])).toBe(false);
  });

  it("fails on skipped only in strict mode", () => {
    expect(hasFailures([outcome("skipped")], true)).toBe(true);
  });
});
