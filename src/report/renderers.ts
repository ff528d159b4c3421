import { buildInstallCommand, ManagerRegistry } from "../managers.js";
import { DuplicateMap } from "../services/duplicateDetector.js";
import { CHECK_STATUSES, CheckOutcome, FailureRecord, ScoredSuggestion, SuggestionResult } from "../types.js";

export type PathFormatter = (filePath: string) => string;

const identity: PathFormatter = (filePath) => filePath;

export interface CheckReportRow {
  package_id: string;
  manager: string;
  command: string;
  name: string;
  file_path: string;
  index: number;
  status: string;
  message: string;
  manager_identifier: string | null;
  return_code: number | null;
}

export interface SuggestionPayload {
  manager: string;
  identifier: string;
  name: string;
  score: number;
  command: string;
  metadata: Record<string, string>;
  query: string;
  raw: string;
}

export interface SuggestionReportRow {
  package_id: string;
  manager: string;
  status: string;
  message: string;
  file_path: string;
  index: number;
  manager_identifier: string | null;
  suggestions: SuggestionPayload[];
  notes: string[];
}

export function renderCheckTable(outcomes: readonly CheckOutcome[], formatPath: PathFormatter = identity): string {
  const header = `${"STATUS".padEnd(10)} ${"PACKAGE".padEnd(24)} ${"MANAGER".padEnd(10)} ${"MANAGER-ID".padEnd(28)} SOURCE`;
  const lines = [header, "-".repeat(header.length)];

  for (const outcome of outcomes) {
    const { entry } = outcome;
    const source = `${formatPath(entry.filePath)}#${entry.index}`;
    lines.push(
      `${outcome.status.toUpperCase().padEnd(10)} ${entry.packageId.padEnd(24)} ${entry.manager.padEnd(10)} ${(
        outcome.managerIdentifier ?? "-"
      ).padEnd(28)} ${source}`
    );
    if (outcome.status !== "ok") {
      lines.push(`  ${outcome.message}`);
    }
  }

  lines.push("", "Summary:");
  for (const status of CHECK_STATUSES) {
    const count = outcomes.filter((outcome) => outcome.status === status).length;
    if (count > 0) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  return lines.join("\n");
}

export function buildCheckReport(outcomes: readonly CheckOutcome[], formatPath: PathFormatter = identity): CheckReportRow[] {
  return outcomes.map(({ entry, status, message, managerIdentifier, returnCode }) => ({
    package_id: entry.packageId,
    manager: entry.manager,
    command: entry.command,
    name: entry.name,
    file_path: formatPath(entry.filePath),
    index: entry.index,
    status,
    message,
    manager_identifier: managerIdentifier ?? null,
    return_code: returnCode ?? null
  }));
}

export function renderJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatMetadata(metadata: Record<string, string>): string {
  return Object.entries(metadata)
    .filter(([, value]) => value)
    .map(([key, value]) => `${key}=${value}`)
    .join(", ");
}

export function roundScore(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}

export function buildSuggestionReport(
  record: FailureRecord,
  result: SuggestionResult,
  limit: number,
  registry: ManagerRegistry
): SuggestionReportRow {
  const { entry } = record;
  return {
    package_id: entry.packageId,
    manager: entry.manager,
    status: record.status,
    message: record.message,
    file_path: entry.filePath,
    index: entry.index,
    manager_identifier: record.managerIdentifier ?? null,
    suggestions: result.suggestions.slice(0, limit).map((item) => toPayload(item, registry)),
    notes: [...result.notes]
  };
}

export function renderSuggestionText(
  record: FailureRecord,
  result: SuggestionResult,
  limit: number,
  registry: ManagerRegistry
): string {
  const { entry } = record;
  const location = entry.index ? `${entry.filePath}#${entry.index}` : entry.filePath;
  const lines = [`${entry.packageId} (${entry.manager}) -> ${record.status.toUpperCase()}`];

  if (record.message) {
    lines.push(`  Reason: ${record.message}`);
  }
  lines.push(`  Catalog: ${location}`);
  if (record.managerIdentifier) {
    lines.push(`  Manager ID: ${record.managerIdentifier}`);
  }

  if (result.suggestions.length > 0) {
    lines.push("  Suggestions:");
    result.suggestions.slice(0, limit).forEach((suggestion, i) => {
      const command = buildInstallCommand(registry, suggestion.manager, suggestion.identifier);
      lines.push(`    ${i + 1}. ${suggestion.manager}: ${command}`);
      lines.push(`       -> ${suggestion.name} (score ${suggestion.score.toFixed(2)}, query '${suggestion.query}')`);
      const metadata = formatMetadata(suggestion.metadata);
      if (metadata) {
        lines.push(`       -> ${metadata}`);
      }
    });
  } else {
    lines.push("  Suggestions: none");
  }

  if (result.notes.length > 0) {
    lines.push("  Notes:");
    for (const note of result.notes) {
      lines.push(`    - ${note}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

export function renderDuplicates(duplicates: DuplicateMap, formatPath: PathFormatter = identity): string {
  const lines: string[] = [];
  for (const [packageId, occurrences] of duplicates) {
    lines.push(`${packageId} (${occurrences.length}x)`);
    for (const occurrence of occurrences) {
      lines.push(`  - ${formatPath(occurrence.filePath)} [entry #${occurrence.index}]`);
    }
  }
  return lines.join("\n");
}

function toPayload(suggestion: ScoredSuggestion, registry: ManagerRegistry): SuggestionPayload {
  return {
    manager: suggestion.manager,
    identifier: suggestion.identifier,
    name: suggestion.name,
    score: roundScore(suggestion.score),
    command: buildInstallCommand(registry, suggestion.manager, suggestion.identifier),
    metadata: suggestion.metadata,
    query: suggestion.query,
    raw: suggestion.raw
  };
}
