/* eslint-disable no-console */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/** Diagnostics go to stderr so that report output on stdout stays parseable. */
export function createLogger(options: { debug?: boolean } = {}): Logger {
  return {
    info: (message) => console.error(message),
    warn: (message) => console.error(`warning: ${message}`),
    error: (message) => console.error(`error: ${message}`),
    debug: (message) => {
      if (options.debug) {
        console.error(`debug: ${message}`);
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
