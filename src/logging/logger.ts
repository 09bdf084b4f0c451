/**
 * Logging
 *
 * Minimal logger interface injected into every component, plus a
 * chalk-coloured console implementation used by the CLI.
 *
 * @module logging/logger
 */

import chalk from 'chalk';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = keyof Logger;

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Show debug output */
  verbose?: boolean;
  /** Suppress info output (warnings and errors still print) */
  quiet?: boolean;
}

// ============================================================================
// Implementations
// ============================================================================

/**
 * Create a logger that writes to the console.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ verbose: true });
 * logger.warn('channel lookup failed');
 * // Warning: channel lookup failed
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug(message, ...args) {
      if (options.verbose) {
        console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
      }
    },
    info(message, ...args) {
      if (!options.quiet) {
        console.log(message, ...args);
      }
    },
    warn(message, ...args) {
      console.warn(chalk.yellow(`Warning: ${message}`), ...args);
    },
    error(message, ...args) {
      console.error(chalk.red(`Error: ${message}`), ...args);
    },
  };
}

const noop = (): void => {};

/**
 * Logger that discards everything. Default for library callers.
 */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Recorded log entry, see {@link createMemoryLogger}.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  args: unknown[];
}

/**
 * Logger that keeps entries in memory. Used by tests and by callers that
 * want to attach the log of a run to its result.
 */
export function createMemoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      entries.push({ level, message, args });
    };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}
