/**
 * Console logging with level prefixes
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Command trace line, printed like `set -x` output */
  trace(commandLine: string): void;
}

export function createConsoleLogger(options?: { verbose?: boolean }): Logger {
  const verbose = options?.verbose ?? false;
  return {
    debug(message) {
      if (verbose) console.log(`[DEBUG] ${message}`);
    },
    info(message) {
      console.log(`[INFO] ${message}`);
    },
    warn(message) {
      console.warn(`[WARN] ${message}`);
    },
    error(message) {
      console.error(`[ERROR] ${message}`);
    },
    trace(commandLine) {
      console.error(`+ ${commandLine}`);
    },
  };
}
