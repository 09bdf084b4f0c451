#!/usr/bin/env node
/**
 * Creator Signals CLI
 *
 * Main entry point for the creator-signals tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   creator-signals --help
 *   creator-signals recommend --window-days 3
 *   creator-signals purchase AAPL MU --amount 10
 *   creator-signals run --amount 10
 *
 * @module cli
 */

import 'dotenv/config';
import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, exitCodeFor, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import { defaultServices, type CliServices } from './services.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @param services - Configuration and client factories (tests pass fakes)
 */
export function createProgram(services: CliServices = defaultServices): Command {
  const program = new Command();

  program
    .name('creator-signals')
    .description('Rank stock tickers recommended by finance creators and simulate purchases')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Stored on the program; subcommands read it through optsWithGlobals()
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.CONFIG_ERROR);
    }
  });

  registerCommands(program, services);

  // Help and version exit cleanly; any other commander error is a usage error
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.CONFIG_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(exitCodeFor(error));
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.ERROR);
  });
}
