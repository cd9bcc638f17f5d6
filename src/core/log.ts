/**
 * Diagnostic logging to stderr
 *
 * stdout is reserved for command output (and the MCP protocol), so every
 * message goes through console.error with a `[linekit]` prefix.
 */

export interface Logger {
  /** Printed only when verbose */
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Replaces console.error, e.g. to capture output in tests */
  sink?: (line: string) => void;
}

const PREFIX = "[linekit]";

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  return {
    debug(message) {
      if (verbose) sink(`${PREFIX} ${message}`);
    },
    info(message) {
      sink(`${PREFIX} ${message}`);
    },
    warn(message) {
      sink(`${PREFIX} warning: ${message}`);
    },
    error(message) {
      sink(`${PREFIX} error: ${message}`);
    },
  };
}
