import { resolve } from "node:path";
import { z } from "zod";
import { CliError } from "./errors.js";

export const DEFAULT_TIMEOUT_SECONDS = 25;
export const DEFAULT_GLOB = "*.yml";
export const DEFAULT_MAX_SUGGESTIONS = 3;
export const DEFAULT_TRIM_COUNT = 20;
export const CATALOG_DIR = ["data", "catalog", "packages"] as const;
export const DEFAULT_FAILURES_FILE = "failures.json";
export const DEFAULT_FIXES_FILE = "fixes.json";

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

function normalize(value?: string): string | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parsePositiveInt(value: string, option: string): number {
  const parsed = positiveInt.safeParse(value);
  if (!parsed.success) {
    throw new CliError("INVALID_OPTION", `${option} must be a positive integer, got '${value}'`);
  }
  return parsed.data;
}

export function parseCount(value: string, option: string): number {
  const parsed = nonNegativeInt.safeParse(value);
  if (!parsed.success) {
    throw new CliError("INVALID_OPTION", `${option} must be a non-negative integer, got '${value}'`);
  }
  return parsed.data;
}

export function resolveRoot(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  const root = normalize(override) ?? normalize(env.CATALOG_AUDIT_ROOT) ?? ".";
  return resolve(process.cwd(), root);
}

export function resolveTimeoutMs(override?: string, env: NodeJS.ProcessEnv = process.env): number {
  const raw = normalize(override) ?? normalize(env.CATALOG_AUDIT_TIMEOUT);
  const seconds = raw === undefined ? DEFAULT_TIMEOUT_SECONDS : parsePositiveInt(raw, "--timeout");
  return seconds * 1000;
}

export function isDebugEnabled(flag: boolean | undefined, env: NodeJS.ProcessEnv = process.env): boolean {
  if (flag) {
    return true;
  }

  const raw = normalize(env.CATALOG_AUDIT_DEBUG)?.toLowerCase();
  return raw === "1" || raw === "true";
}

/** Resolves `path` against `root` unless it is already absolute. */
export function resolveFrom(root: string, path: string | undefined, fallback: string): string {
  return resolve(root, normalize(path) ?? fallback);
}
