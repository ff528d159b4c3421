export class CliError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(code: string, message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class CommandLaunchError extends Error {
  constructor(
    readonly command: string,
    cause?: unknown
  ) {
    super(`Failed to start '${command}'`, { cause });
    this.name = "CommandLaunchError";
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeoutMs: number
  ) {
    super(`'${command}' exceeded the ${formatSeconds(timeoutMs)}s timeout`);
    this.name = "CommandTimeoutError";
  }
}

/** Raised by a manager search that produced neither rows nor an empty-result marker. */
export class SearchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchError";
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class FixListError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FixListError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The one-line message the entry point prints before exiting. */
export function formatFailure(error: unknown): string {
  if (error instanceof CliError) {
    return `catalog-audit failed [${error.code}]: ${error.message}`;
  }
  return `catalog-audit failed: ${errorMessage(error)}`;
}

export function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1);
}
