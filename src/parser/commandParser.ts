import { ManagerProfile, ManagerRegistry } from "../managers.js";
import { CatalogEntry } from "../types.js";

const QUOTES = new Set(["\"", "'"]);

/**
 * Splits a command line on whitespace, keeping quoted runs (quotes included)
 * inside a single token. Throws on an unterminated quote.
 */
export function tokenize(command: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: string | null = null;

  for (const ch of command) {
    if (quote) {
      current += ch;
      if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (QUOTES.has(ch)) {
      quote = ch;
      current += ch;
      inToken = true;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }

    current += ch;
    inToken = true;
  }

  if (quote) {
    throw new Error(`Unterminated ${quote} quote in command`);
  }

  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

export function splitCommand(command: string): string[] {
  if (!command) {
    return [];
  }

  try {
    return tokenize(command);
  } catch {
    return command.split(/\s+/).filter(Boolean);
  }
}

export function extractManagerIdentifier(command: string, profile: ManagerProfile): string | undefined {
  if (!command) {
    return undefined;
  }

  if (profile.idFlag) {
    const match = command.match(idFlagPattern(profile.idFlag));
    if (match) {
      return match[1];
    }
  }

  return extractPositional(splitCommand(command), profile);
}

export function extractEntryIdentifier(entry: CatalogEntry, registry: ManagerRegistry): string | undefined {
  const profile = registry.get(entry.manager);
  return profile ? extractManagerIdentifier(entry.command, profile) : undefined;
}

function extractPositional(tokens: string[], profile: ManagerProfile): string | undefined {
  const cli = profile.cli.toLowerCase();

  for (let i = 0; i < tokens.length; i += 1) {
    if (tokens[i].toLowerCase() !== cli) {
      continue;
    }

    const verbIndex = i + 1;
    if (verbIndex >= tokens.length) {
      return undefined;
    }

    if (!profile.verbs.includes(tokens[verbIndex].toLowerCase())) {
      continue;
    }

    for (let j = verbIndex + 1; j < tokens.length; j += 1) {
      const candidate = tokens[j];
      if (!candidate || candidate.startsWith("-")) {
        continue;
      }
      return stripQuotes(candidate);
    }
  }

  return undefined;
}

function idFlagPattern(flag: string): RegExp {
  const escaped = flag.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`${escaped}(?:=|\\s+)([\\w.\\-]+)`, "i");
}

function stripQuotes(value: string): string {
  return value.replace(/^["']+|["']+$/g, "");
}
