export type CheckStatus = "ok" | "not-found" | "error" | "skipped";

export const CHECK_STATUSES: readonly CheckStatus[] = ["ok", "not-found", "error", "skipped"];

export interface CatalogEntry {
  readonly packageId: string;
  readonly manager: string;
  readonly command: string;
  readonly name: string;
  readonly filePath: string;
  readonly index: number;
}

export interface CheckOutcome {
  entry: CatalogEntry;
  managerIdentifier?: string;
  status: CheckStatus;
  message: string;
  returnCode?: number;
}

/**
 * A check result read back from a JSON report. The status is kept as written
 * so that records produced by older runs still load.
 */
export interface FailureRecord {
  entry: CatalogEntry;
  status: string;
  message: string;
  managerIdentifier?: string;
}

export interface SearchCandidate {
  manager: string;
  identifier: string;
  name: string;
  metadata: Record<string, string>;
  query: string;
  raw: string;
}

export interface ScoredSuggestion extends SearchCandidate {
  score: number;
}

export interface SuggestionResult {
  suggestions: ScoredSuggestion[];
  notes: string[];
}

export interface ParsedCatalog {
  entries: CatalogEntry[];
  /** Records dropped for lacking an `id` or `manager`. */
  skipped: number;
}

export interface PackageOccurrence {
  packageId: string;
  filePath: string;
  index: number;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
}

export interface CommandExecutor {
  run(cmd: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}
