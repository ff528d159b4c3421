import { Command } from "commander";
import { isDebugEnabled } from "../config.js";
import { createLogger, Logger } from "../logger.js";
import { createDefaultRegistry, ManagerRegistry } from "../managers.js";
import { ShellCommandRunner } from "../services/commandRunner.js";
import { CommandExecutor } from "../types.js";

export interface CommandContext {
  runner: CommandExecutor;
  registry: ManagerRegistry;
  logger: Logger;
  /** Writes report output (stdout in production). */
  out: (text: string) => void;
}

export type ContextFactory = (options: { debug: boolean }) => CommandContext;

export const defaultContextFactory: ContextFactory = ({ debug }) => ({
  runner: new ShellCommandRunner(),
  registry: createDefaultRegistry(),
  logger: createLogger({ debug: isDebugEnabled(debug) }),
  out: (text) => {
    process.stdout.write(`${text}\n`);
  }
});

export function contextFor(command: Command, factory: ContextFactory): CommandContext {
  const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
  return factory({ debug: Boolean(verbose) });
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
