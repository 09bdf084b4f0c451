/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - recommend: Rank tickers recommended in recent creator videos
 * - purchase: Simulate purchasing tickers into the ledger
 * - run: Recommend, then purchase the top assets
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { CliServices } from '../services.js';
import { registerPurchaseCommand } from './purchase.js';
import { registerRecommendCommand } from './recommend.js';
import { registerRunCommand } from './run.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command, services: CliServices): void {
  registerRecommendCommand(program, services);
  registerPurchaseCommand(program, services);
  registerRunCommand(program, services);
}
