export const SNIPPET_LIMIT = 200;

/** Collapses whitespace and cuts the result at `limit` characters. */
export function summarizeOutput(output: string, limit = SNIPPET_LIMIT): string {
  if (!output) {
    return "";
  }

  const snippet = output.split(/\s+/).filter(Boolean).join(" ");
  if (snippet.length <= limit) {
    return snippet;
  }

  return `${snippet.slice(0, limit).trimEnd()}...`;
}

export function containsMarker(output: string, markers: readonly string[]): boolean {
  const normalized = output.toLowerCase();
  return markers.some((marker) => normalized.includes(marker));
}

export function splitColumns(line: string): string[] {
  return line.trim().split(/\s{2,}/);
}

export function nonBlankLines(output: string): string[] {
  return output.split(/\r?\n/).filter((line) => line.trim().length > 0);
}
