/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A {@link Logger} for the library components a command drives
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { ConfigurationError } from '../config/index.js';
import { createConsoleLogger, type Logger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export type GlobalOptions = {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
};

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid configuration, arguments or channel list */
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error escaping a command.
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ConfigurationError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * .action(async (options, cmd: Command) => {
 *   const base = getBaseCommand(cmd);
 *   let result: PipelineResult;
 *   try {
 *     result = await runRecommendationPipeline(config, deps);
 *   } catch (error) {
 *     return base.handleError(error);
 *   }
 *   base.success(`Ranked ${result.ranked.length} ticker(s)`);
 * });
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param errorOrCode - Error object (exit 1, stack shown when verbose) or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    } else {
      process.exit(EXIT_CODES.ERROR);
    }
  }

  /**
   * Report an error thrown by a command and exit with the matching code.
   */
  handleError(error: unknown): never {
    const message = error instanceof Error ? error.message : String(error);
    if (this.options.verbose && error instanceof Error && error.stack) {
      console.error(chalk.dim(error.stack));
    }
    return this.error(message, exitCodeFor(error));
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON. Printed even in quiet mode.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Console logger honouring the global verbose and quiet flags.
   *
   * @param quiet - Also suppress info output, e.g. while printing JSON
   */
  logger(quiet = false): Logger {
    return createConsoleLogger({
      verbose: this.isVerbose(),
      quiet: quiet || this.isQuiet(),
    });
  }

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Exit with a specific code, for failures already reported elsewhere.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command stored by the program's preAction hook.
 * Falls back to a default instance when a command runs on its own.
 */
export function getBaseCommand(cmd: { optsWithGlobals(): Record<string, unknown> }): BaseCommand {
  const base = cmd.optsWithGlobals()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
