/**
 * Purchase Command
 *
 * Simulates buying the given tickers and appends one ledger row per
 * ticker. A missing or inconsistent amount exits with the configuration
 * error code and writes nothing.
 *
 * @module cli/commands/purchase
 */

import type { Command } from 'commander';
import type { AppConfig } from '../../config/index.js';
import { countOutcomes } from '../../pipeline/index.js';
import { AssetPurchaser, type PurchaseResult } from '../../purchasing/index.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand } from '../base-command.js';
import { formatPurchaseRecords } from '../formatters/index.js';
import {
  normalizeTickers,
  parseAmountList,
  parseNonNegativeInt,
  parsePositiveNumber,
} from '../options.js';
import type { CliServices } from '../services.js';

/**
 * Options for the purchase command.
 */
export interface PurchaseOptions {
  /** Quantity for every asset */
  amount?: number;
  /** Quantity per asset, in argument order */
  amounts?: number[];
  validDays?: number;
  /** Ledger file to append to */
  ledger?: string;
  json?: boolean;
}

export async function executePurchase(
  base: BaseCommand,
  services: CliServices,
  config: AppConfig,
  assets: string[],
  options: PurchaseOptions
): Promise<PurchaseResult> {
  base.debug(`Ledger: ${options.ledger ?? config.ledgerFile}`);
  const priceLookup = await services.createPriceLookup();
  const purchaser = new AssetPurchaser(
    {
      assets,
      validPurchaseDays: options.validDays ?? config.validPurchaseDays,
      assetPurchaseAmounts: options.amounts,
      universalPurchaseAmount: options.amount,
      ledgerPath: options.ledger ?? config.ledgerFile,
    },
    { priceLookup, logger: base.logger(options.json === true) }
  );
  return purchaser.purchase();
}

/**
 * Print the rows written, or exit when the purchaser refused to run.
 * The purchaser has already logged the configuration error.
 */
export function reportPurchase(base: BaseCommand, result: PurchaseResult, json: boolean): void {
  if (result.status === 'config_error') {
    return base.exitWith(EXIT_CODES.CONFIG_ERROR);
  }

  if (json) {
    base.json({ ledgerPath: result.ledgerPath, records: result.records, outcomes: result.outcomes });
    return;
  }

  base.section('Simulated purchases');
  for (const line of formatPurchaseRecords(result.records)) {
    base.info(line);
  }
  base.blank();

  const counts = countOutcomes(result.outcomes);
  if (counts.failed > 0) {
    base.warn(`${counts.failed} price lookup(s) failed; recorded with price -1.0`);
  }
  base.success(`Appended ${result.records.length} row(s) to ${result.ledgerPath}`);
}

export function registerPurchaseCommand(program: Command, services: CliServices): void {
  program
    .command('purchase <assets...>')
    .description('Simulate purchasing tickers into the ledger')
    .option('-a, --amount <n>', 'Quantity for every asset', parsePositiveNumber)
    .option('--amounts <list>', 'Comma-separated quantity per asset, in order', parseAmountList)
    .option('-d, --valid-days <n>', 'Days until the purchase expires', parseNonNegativeInt)
    .option('-l, --ledger <file>', 'Ledger file (default: CREATOR_SIGNALS_LEDGER_FILE)')
    .option('--json', 'Print the result as JSON')
    .action(async (assets: string[], options: PurchaseOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      let result: PurchaseResult;
      try {
        const config = services.loadConfig();
        result = await executePurchase(base, services, config, normalizeTickers(assets), options);
      } catch (error) {
        return base.handleError(error);
      }

      reportPurchase(base, result, options.json === true);
    });
}
