import { isAbsolute, join } from "node:path";
import { z } from "zod";
import { errorMessage, SearchError } from "../errors.js";
import { Logger, silentLogger } from "../logger.js";
import { ManagerRegistry } from "../managers.js";
import { extractEntryIdentifier } from "../parser/commandParser.js";
import { CommandExecutor, FailureRecord, ScoredSuggestion, SearchCandidate, SuggestionResult } from "../types.js";
import { CandidateSearch, dedupeCandidates, gatherQueries } from "./candidateSearch.js";
import { lowerSet } from "./catalogService.js";
import { rankSuggestions, SuggestionScorer } from "./suggestionScorer.js";

const FAILING_STATUSES = new Set(["not-found", "error"]);

const text = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value)));

const CheckRecordSchema = z.object({
  package_id: text,
  manager: text,
  command: text,
  name: text,
  file_path: text,
  index: z.coerce.number().int().catch(0),
  status: text,
  message: text,
  manager_identifier: z.string().nullish()
});

export const CheckReportSchema = z.array(CheckRecordSchema);

/** Reads the JSON array written by `check --format json`. */
export function parseCheckReport(payload: unknown, root: string): FailureRecord[] {
  return CheckReportSchema.parse(payload).map((raw) => ({
    entry: {
      packageId: raw.package_id,
      manager: raw.manager,
      command: raw.command,
      name: raw.name,
      filePath: isAbsolute(raw.file_path) ? raw.file_path : join(root, raw.file_path),
      index: raw.index
    },
    status: raw.status,
    message: raw.message,
    managerIdentifier: raw.manager_identifier || undefined
  }));
}

export function filterFailures(
  records: readonly FailureRecord[],
  filters: { managers?: readonly string[]; packageIds?: readonly string[] }
): FailureRecord[] {
  const managers = lowerSet(filters.managers);
  const packageIds = lowerSet(filters.packageIds);

  return records.filter(
    (record) =>
      (managers.size === 0 || managers.has(record.entry.manager.toLowerCase())) &&
      (packageIds.size === 0 || packageIds.has(record.entry.packageId.toLowerCase())) &&
      FAILING_STATUSES.has(record.status.toLowerCase())
  );
}

export class FixSuggester {
  private readonly search: CandidateSearch;
  private readonly scorer: SuggestionScorer;

  constructor(
    runner: CommandExecutor,
    private readonly registry: ManagerRegistry,
    private readonly logger: Logger = silentLogger
  ) {
    this.search = new CandidateSearch(runner);
    this.scorer = new SuggestionScorer(registry);
  }

  /**
   * Requested search managers, canonicalised and deduplicated with winget
   * first. Unknown names are dropped; an empty request means every manager.
   */
  resolveSearchManagers(requested: readonly string[] = []): string[] {
    if (requested.length === 0) {
      return this.registry.keys();
    }

    const resolved = new Set<string>();
    for (const item of requested) {
      const profile = this.registry.get(item);
      if (profile) {
        resolved.add(profile.key);
      } else {
        this.logger.warn(`ignoring unknown search manager '${item}'`);
      }
    }

    return [...resolved].sort((left, right) => {
      if (left === right) {
        return 0;
      }
      if (left === "winget") {
        return -1;
      }
      if (right === "winget") {
        return 1;
      }
      return left < right ? -1 : 1;
    });
  }

  /**
   * Searches every manager for replacements of a failing entry. Attaches the
   * manager identifier derived from the entry's command when the record has
   * none.
   */
  async suggest(record: FailureRecord, managers: readonly string[], timeoutMs: number): Promise<SuggestionResult> {
    if (!record.managerIdentifier) {
      record.managerIdentifier = extractEntryIdentifier(record.entry, this.registry);
    }

    const { entry } = record;
    const queries = gatherQueries(entry.packageId, record.managerIdentifier, entry.name);
    const suggestions: ScoredSuggestion[] = [];
    const notes: string[] = [];

    for (const manager of managers) {
      const profile = this.registry.get(manager);
      if (!profile) {
        notes.push(`${manager}: no search implementation available.`);
        continue;
      }

      let candidates: SearchCandidate[] = [];
      let lastError: string | undefined;
      for (const query of queries) {
        try {
          candidates = await this.search.collect(profile, query, timeoutMs);
        } catch (error) {
          if (!(error instanceof SearchError)) {
            throw error;
          }
          lastError = errorMessage(error);
          this.logger.debug(`${manager} search for '${query}' failed: ${lastError}`);
          continue;
        }
        if (candidates.length > 0) {
          break;
        }
      }

      if (candidates.length === 0) {
        notes.push(lastError ? `${manager}: ${lastError}` : `${manager}: no matches for queries ${queries.join(", ")}`);
        continue;
      }

      suggestions.push(...this.scorer.scoreAll(entry, record.managerIdentifier, dedupeCandidates(candidates)));
    }

    return { suggestions: rankSuggestions(suggestions), notes };
  }
}
