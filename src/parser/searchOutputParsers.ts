import { SearchCandidate } from "../types.js";
import { containsMarker, nonBlankLines, splitColumns } from "../utils/text.js";

/**
 * Turns the text a manager's search command prints into candidates.
 *
 * Each manager gets its own parser so that a change in one tool's output
 * format stays contained to that parser.
 */
export interface SearchOutputParser {
  /** Lower-cased phrases the tool prints when a search has no results. */
  readonly emptyMarkers: readonly string[];
  parse(output: string, query: string): SearchCandidate[];
}

export interface ParserOptions {
  manager: string;
  emptyMarkers: readonly string[];
}

export interface ColumnParserOptions extends ParserOptions {
  /** Metadata keys for the columns that follow name and identifier. */
  metadataColumns: readonly string[];
}

const RULE_RE = /^-+$/;

/**
 * Name, identifier and further columns separated by runs of two or more
 * spaces, as printed by `winget search`.
 */
export function createColumnParser(options: ColumnParserOptions): SearchOutputParser {
  return {
    emptyMarkers: options.emptyMarkers,
    parse(output, query) {
      if (containsMarker(output, options.emptyMarkers)) {
        return [];
      }

      const results: SearchCandidate[] = [];
      for (const rawLine of nonBlankLines(output)) {
        const line = rawLine.trimEnd();
        const trimmed = line.trim();
        if (trimmed.toLowerCase().startsWith("name ") || RULE_RE.test(trimmed)) {
          continue;
        }

        const columns = splitColumns(trimmed);
        if (columns.length < 2) {
          continue;
        }

        const [name, identifier, ...rest] = columns;
        const metadata: Record<string, string> = {};
        options.metadataColumns.forEach((key, i) => {
          const value = rest[i];
          if (value !== undefined) {
            metadata[key] = value;
          }
        });

        results.push({ manager: options.manager, identifier, name, metadata, query, raw: line });
      }

      return results;
    }
  };
}

/** `id|version` rows, as printed by `choco search --limit-output`. */
export function createPipeParser(options: ParserOptions): SearchOutputParser {
  return {
    emptyMarkers: options.emptyMarkers,
    parse(output, query) {
      if (containsMarker(output, options.emptyMarkers)) {
        return [];
      }

      const results: SearchCandidate[] = [];
      for (const rawLine of output.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || !line.includes("|")) {
          continue;
        }

        const parts = line.split("|");
        const identifier = parts[0].trim();
        const version = parts.length > 1 ? parts[1].trim() : "";
        results.push({
          manager: options.manager,
          identifier,
          name: identifier,
          metadata: { version },
          query,
          raw: line
        });
      }

      return results;
    }
  };
}

/** Name plus an optional bucket column, as printed by `scoop search`. */
export function createBucketParser(options: ParserOptions): SearchOutputParser {
  return {
    emptyMarkers: options.emptyMarkers,
    parse(output, query) {
      if (containsMarker(output, options.emptyMarkers)) {
        return [];
      }

      const results: SearchCandidate[] = [];
      for (const line of output.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed) {
          continue;
        }

        const lowered = trimmed.toLowerCase();
        if (
          lowered.startsWith("name ") ||
          lowered.startsWith("----") ||
          lowered.startsWith("warn") ||
          lowered.startsWith("results from")
        ) {
          continue;
        }

        const [identifier, bucket] = splitColumns(trimmed);
        if (!identifier || identifier.toLowerCase() === "name") {
          continue;
        }

        results.push({
          manager: options.manager,
          identifier,
          name: identifier,
          metadata: bucket ? { bucket } : {},
          query,
          raw: line
        });
      }

      return results;
    }
  };
}
