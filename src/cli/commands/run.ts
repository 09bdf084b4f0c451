/**
 * Run Command
 *
 * Recommend, then simulate purchasing the top-ranked tickers with one
 * quantity each.
 *
 * @module cli/commands/run
 */

import type { Command } from 'commander';
import type { PipelineResult } from '../../pipeline/index.js';
import type { PurchaseResult } from '../../purchasing/index.js';
import { getBaseCommand } from '../base-command.js';
import { toRunReport } from '../formatters/index.js';
import { parseNonNegativeInt, parsePositiveNumber } from '../options.js';
import type { CliServices } from '../services.js';
import { executePurchase, reportPurchase } from './purchase.js';
import { addRecommendOptions, executeRecommendation, printRecommendation, type RecommendOptions } from './recommend.js';

interface RunOptions extends RecommendOptions {
  amount: number;
  validDays?: number;
  ledger?: string;
}

export function registerRunCommand(program: Command, services: CliServices): void {
  addRecommendOptions(
    program
      .command('run')
      .description('Recommend tickers, then simulate purchasing the top assets')
      .requiredOption('-a, --amount <n>', 'Quantity for every purchased asset', parsePositiveNumber)
      .option('-d, --valid-days <n>', 'Days until the purchase expires', parseNonNegativeInt)
      .option('-l, --ledger <file>', 'Ledger file (default: CREATOR_SIGNALS_LEDGER_FILE)')
  ).action(async (options: RunOptions, cmd: Command) => {
    const base = getBaseCommand(cmd);
    const json = options.json === true;

    let recommendation: PipelineResult;
    let purchase: PurchaseResult | undefined;
    try {
      const config = services.loadConfig();
      recommendation = await executeRecommendation(base, services, config, options);
      if (recommendation.topAssets.length > 0) {
        purchase = await executePurchase(base, services, config, recommendation.topAssets, {
          amount: options.amount,
          validDays: options.validDays,
          ledger: options.ledger,
          json,
        });
      }
    } catch (error) {
      return base.handleError(error);
    }

    if (purchase?.status === 'config_error') {
      return reportPurchase(base, purchase, json);
    }

    if (json) {
      base.json({ ...toRunReport(recommendation), purchases: purchase?.records ?? [] });
      return;
    }

    printRecommendation(base, recommendation);
    if (purchase === undefined) {
      base.warn('No tickers were recommended; nothing to purchase');
      return;
    }
    reportPurchase(base, purchase, json);
  });
}
