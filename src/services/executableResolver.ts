import { accessSync, constants, statSync } from "node:fs";
import { isAbsolute, join } from "node:path";

export const SHIM_SUFFIXES = [".exe", ".bat", ".cmd", ".ps1"] as const;

const POWERSHELL_HOSTS = ["pwsh", "powershell"];

export interface ResolvedCommand {
  cmd: string;
  args: string[];
}

export interface ResolverEnvironment {
  path: string;
  pathExt?: string;
  platform: NodeJS.Platform;
  comSpec?: string;
}

export function currentEnvironment(): ResolverEnvironment {
  return {
    path: process.env.PATH ?? process.env.Path ?? "",
    pathExt: process.env.PATHEXT,
    platform: process.platform,
    comSpec: process.env.ComSpec
  };
}

/**
 * Finds a manager CLI on the search path the way a shell would, then falls
 * back to the shim files package managers drop on Windows (`scoop.ps1`,
 * `choco.exe`, ...). Scripts that need an interpreter are wrapped in one.
 */
export class ExecutableResolver {
  constructor(
    private readonly env: ResolverEnvironment = currentEnvironment(),
    private readonly isRunnable: (file: string, requireExecBit: boolean) => boolean = fileIsRunnable
  ) {}

  resolve(cmd: string, args: string[]): ResolvedCommand {
    const resolved = this.which(cmd) ?? this.findShim(cmd);
    if (!resolved) {
      return { cmd, args };
    }

    return this.wrap(resolved, args);
  }

  which(name: string): string | undefined {
    if (isAbsolute(name) || name.includes("/") || name.includes("\\")) {
      return this.isRunnable(name, this.requiresExecBit()) ? name : undefined;
    }

    const extensions = this.env.platform === "win32" ? ["", ...this.pathExtensions()] : [""];
    for (const dir of this.searchDirectories()) {
      for (const ext of extensions) {
        const candidate = join(dir, `${name}${ext}`);
        if (this.isRunnable(candidate, this.requiresExecBit())) {
          return candidate;
        }
      }
    }

    return undefined;
  }

  findShim(name: string): string | undefined {
    for (const dir of this.searchDirectories()) {
      for (const suffix of SHIM_SUFFIXES) {
        const candidate = join(dir, `${name}${suffix}`);
        if (this.isRunnable(candidate, false)) {
          return candidate;
        }
      }
    }

    return undefined;
  }

  private wrap(resolved: string, args: string[]): ResolvedCommand {
    const lower = resolved.toLowerCase();

    if (lower.endsWith(".ps1")) {
      const host = POWERSHELL_HOSTS.map((candidate) => this.which(candidate)).find(Boolean);
      if (host) {
        return {
          cmd: host,
          args: ["-NoLogo", "-NoProfile", "-ExecutionPolicy", "Bypass", "-File", resolved, ...args]
        };
      }
    }

    if (this.env.platform === "win32" && (lower.endsWith(".bat") || lower.endsWith(".cmd"))) {
      return { cmd: this.env.comSpec ?? "cmd.exe", args: ["/d", "/s", "/c", resolved, ...args] };
    }

    return { cmd: resolved, args };
  }

  private searchDirectories(): string[] {
    const delimiter = this.env.platform === "win32" ? ";" : ":";
    return this.env.path
      .split(delimiter)
      .map((dir) => dir.trim().replace(/^"|"$/g, ""))
      .filter(Boolean);
  }

  private pathExtensions(): string[] {
    const raw = this.env.pathExt ?? ".COM;.EXE;.BAT;.CMD";
    return raw.split(";").filter(Boolean).map((ext) => ext.toLowerCase());
  }

  private requiresExecBit(): boolean {
    return this.env.platform !== "win32";
  }
}

function fileIsRunnable(file: string, requireExecBit: boolean): boolean {
  try {
    if (!statSync(file).isFile()) {
      return false;
    }
    if (requireExecBit) {
      accessSync(file, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}
