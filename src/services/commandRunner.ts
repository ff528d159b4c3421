import { ChildProcess, spawn } from "node:child_process";
import { CommandLaunchError, CommandTimeoutError } from "../errors.js";
import { CommandExecutor, CommandResult, RunOptions } from "../types.js";
import { ExecutableResolver } from "./executableResolver.js";

export class ShellCommandRunner implements CommandExecutor {
  constructor(private readonly resolver = new ExecutableResolver()) {}

  async run(cmd: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const prepared = this.resolver.resolve(cmd, args);

    return new Promise((resolve, reject) => {
      const child = spawn(prepared.cmd, prepared.args, {
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true
      });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const timer =
        options.timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              if (settled) {
                return;
              }
              settled = true;
              terminate(child);
              reject(new CommandTimeoutError(cmd, options.timeoutMs ?? 0));
            }, options.timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => {
        stdout.push(chunk);
      });

      child.stderr.on("data", (chunk: Buffer) => {
        stderr.push(chunk);
      });

      child.on("error", (error) => {
        clearTimeout(timer);
        if (settled) {
          return;
        }
        settled = true;
        reject(new CommandLaunchError(cmd, error));
      });

      child.on("close", (code) => {
        clearTimeout(timer);
        if (settled) {
          return;
        }
        settled = true;
        // toString("utf8") substitutes U+FFFD for bytes that do not decode.
        resolve({
          code: code ?? 1,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8")
        });
      });
    });
  }
}

/**
 * Hard-stops a timed-out child. On Windows the spawned process may be a
 * `cmd.exe` or PowerShell wrapper, so the whole tree goes.
 */
function terminate(child: ChildProcess): void {
  if (process.platform === "win32" && child.pid !== undefined) {
    const killer = spawn("taskkill", ["/T", "/F", "/PID", String(child.pid)], {
      stdio: "ignore",
      windowsHide: true
    });
    killer.on("error", () => {
      child.kill("SIGKILL");
    });
    return;
  }

  child.kill("SIGKILL");
}
