import { CommandLaunchError, CommandTimeoutError, formatSeconds } from "../errors.js";
import { ManagerRegistry } from "../managers.js";
import { extractManagerIdentifier } from "../parser/commandParser.js";
import { CatalogEntry, CheckOutcome, CommandExecutor } from "../types.js";
import { classifyResult } from "./resultClassifier.js";

export interface CheckProgress {
  position: number;
  total: number;
  entry: CatalogEntry;
  outcome?: CheckOutcome;
}

export interface CheckAllOptions {
  timeoutMs: number;
  /** Called before each check (no outcome yet) and after it. */
  onProgress?: (progress: CheckProgress) => void;
}

export class AvailabilityChecker {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly registry: ManagerRegistry
  ) {}

  async check(entry: CatalogEntry, timeoutMs: number): Promise<CheckOutcome> {
    const profile = this.registry.get(entry.manager);
    if (!profile) {
      return { entry, status: "skipped", message: `No CLI mapping registered for manager '${entry.manager}'.` };
    }

    const managerIdentifier = extractManagerIdentifier(entry.command, profile);
    if (!managerIdentifier) {
      return {
        entry,
        status: "skipped",
        message: "Unable to determine manager-specific identifier from command."
      };
    }

    let code: number;
    let output: string;
    try {
      const result = await this.runner.run(profile.cli, profile.checkArgs(managerIdentifier), { timeoutMs });
      code = result.code;
      output = result.stdout + result.stderr;
    } catch (error) {
      if (error instanceof CommandLaunchError) {
        return {
          entry,
          managerIdentifier,
          status: "error",
          message: `Failed to start '${profile.cli}'. Ensure it is installed.`
        };
      }
      if (error instanceof CommandTimeoutError) {
        return {
          entry,
          managerIdentifier,
          status: "error",
          message: `Verification command exceeded the ${formatSeconds(timeoutMs)}s timeout.`
        };
      }
      throw error;
    }

    const { status, message } = classifyResult(profile, managerIdentifier, code, output);
    return { entry, managerIdentifier, status, message, returnCode: code };
  }

  async checkAll(entries: readonly CatalogEntry[], options: CheckAllOptions): Promise<CheckOutcome[]> {
    const outcomes: CheckOutcome[] = [];
    const total = entries.length;

    for (const [i, entry] of entries.entries()) {
      options.onProgress?.({ position: i + 1, total, entry });
      const outcome = await this.check(entry, options.timeoutMs);
      options.onProgress?.({ position: i + 1, total, entry, outcome });
      outcomes.push(outcome);
    }

    return outcomes;
  }
}

export function hasFailures(outcomes: readonly CheckOutcome[], strict = false): boolean {
  return outcomes.some(
    (outcome) =>
      outcome.status === "not-found" || outcome.status === "error" || (strict && outcome.status === "skipped")
  );
}
