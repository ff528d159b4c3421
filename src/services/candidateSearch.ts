import { CommandLaunchError, CommandTimeoutError, formatSeconds, SearchError } from "../errors.js";
import { ManagerProfile } from "../managers.js";
import { CommandExecutor, SearchCandidate } from "../types.js";
import { containsMarker, summarizeOutput } from "../utils/text.js";

export class CandidateSearch {
  constructor(private readonly runner: CommandExecutor) {}

  /**
   * Runs the manager's search command for `query` and yields the parsed rows.
   * Iterating again runs the command again.
   */
  async *search(profile: ManagerProfile, query: string, timeoutMs: number): AsyncGenerator<SearchCandidate> {
    const { code, output } = await this.execute(profile, query, timeoutMs);
    const candidates = profile.parser.parse(output, query);

    if (candidates.length === 0 && code !== 0 && !containsMarker(output, profile.parser.emptyMarkers)) {
      if (!output.trim()) {
        throw new SearchError(`${profile.cli} search returned no output`);
      }
      throw new SearchError(`${profile.cli} search failed with exit code ${code}: ${summarizeOutput(output)}`);
    }

    yield* candidates;
  }

  async collect(profile: ManagerProfile, query: string, timeoutMs: number): Promise<SearchCandidate[]> {
    const results: SearchCandidate[] = [];
    for await (const candidate of this.search(profile, query, timeoutMs)) {
      results.push(candidate);
    }
    return results;
  }

  private async execute(
    profile: ManagerProfile,
    query: string,
    timeoutMs: number
  ): Promise<{ code: number; output: string }> {
    try {
      const result = await this.runner.run(profile.cli, profile.searchArgs(query), { timeoutMs });
      return { code: result.code, output: result.stdout + result.stderr };
    } catch (error) {
      if (error instanceof CommandLaunchError) {
        throw new SearchError(`CLI '${profile.cli}' is not available on PATH.`);
      }
      if (error instanceof CommandTimeoutError) {
        throw new SearchError(`${profile.cli} search exceeded the ${formatSeconds(timeoutMs)}s timeout.`);
      }
      throw error;
    }
  }
}

/**
 * Search terms for a failing entry: package id, manager identifier, display
 * name. Blank and case-insensitively repeated values are dropped.
 */
export function gatherQueries(packageId: string, managerIdentifier: string | undefined, name: string): string[] {
  const queries: string[] = [];
  const seen = new Set<string>();

  for (const value of [packageId, managerIdentifier, name]) {
    const text = (value ?? "").trim();
    const key = text.toLowerCase();
    if (text && !seen.has(key)) {
      queries.push(text);
      seen.add(key);
    }
  }

  return queries.length > 0 ? queries : [packageId];
}

export function dedupeCandidates(candidates: Iterable<SearchCandidate>): SearchCandidate[] {
  const seen = new Map<string, SearchCandidate>();
  for (const candidate of candidates) {
    const key = `${candidate.manager}\u0000${candidate.identifier.toLowerCase()}`;
    if (!seen.has(key)) {
      seen.set(key, candidate);
    }
  }
  return [...seen.values()];
}
