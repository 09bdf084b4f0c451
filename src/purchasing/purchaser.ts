/**
 * Asset Purchaser
 *
 * Simulates buying a list of assets by appending one ledger row per
 * asset with its latest price and an expiration date.
 *
 * Error Handling:
 * - Missing or inconsistent amounts, live mode: 'config_error', nothing written
 * - Price lookup failure: row written with the sentinel price -1.0, error logged
 * - Ledger write failure: thrown
 *
 * @module purchasing/purchaser
 */

import { silentLogger, type Logger } from '../logging/index.js';
import {
  describeError,
  failed,
  ok,
  type ItemOutcome,
} from '../pipeline/types.js';
import { SENTINEL_PRICE, type PurchaseRecord } from '../schemas/index.js';
import { appendPurchaseRecord, expirationDate } from './ledger.js';
import type { PriceLookup } from './price.js';

// ============================================================================
// Types
// ============================================================================

export interface AssetPurchaserOptions {
  /** Tickers to buy, in order */
  assets: string[];
  /** Days until an unfilled purchase expires */
  validPurchaseDays: number;
  /** Quantity per asset, same length and order as `assets`. Takes precedence. */
  assetPurchaseAmounts?: number[];
  /** Quantity applied to every asset when per-asset amounts are absent */
  universalPurchaseAmount?: number;
  /** Only simulated purchases are supported (default: true) */
  simulationMode?: boolean;
  /** Ledger file to append to */
  ledgerPath: string;
  /** Reference time for expiration dates */
  now?: Date;
}

export interface PurchaserDependencies {
  priceLookup: PriceLookup;
  logger?: Logger;
}

/**
 * Outcome of one purchaser invocation.
 *
 * On completion, `records` holds every row written. An asset whose price
 * lookup failed is still written (with the sentinel price) and its
 * outcome is 'failed'.
 */
export type PurchaseResult =
  | { status: 'config_error'; reason: string }
  | {
      status: 'completed';
      ledgerPath: string;
      records: PurchaseRecord[];
      outcomes: ItemOutcome<PurchaseRecord>[];
    };

// ============================================================================
// Purchaser
// ============================================================================

/**
 * @example
 * ```typescript
 * const purchaser = new AssetPurchaser(
 *   { assets: ['AAPL', 'MU'], validPurchaseDays: 4, universalPurchaseAmount: 1000, ledgerPath },
 *   { priceLookup: new YahooPriceLookup() }
 * );
 * const result = await purchaser.purchase();
 * ```
 */
export class AssetPurchaser {
  private readonly logger: Logger;

  constructor(
    private readonly options: AssetPurchaserOptions,
    private readonly deps: PurchaserDependencies
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  async purchase(): Promise<PurchaseResult> {
    const plan = this.resolveQuantities();
    if (typeof plan === 'string') {
      this.logger.error(`Asset purchaser: ${plan}`);
      return { status: 'config_error', reason: plan };
    }

    const expiration = expirationDate(this.options.now ?? new Date(), this.options.validPurchaseDays);
    const records: PurchaseRecord[] = [];
    const outcomes: ItemOutcome<PurchaseRecord>[] = [];

    for (const { asset, quantity } of plan) {
      let price: number;
      let lookupError: string | undefined;
      try {
        price = await this.deps.priceLookup.latestClose(asset);
      } catch (error) {
        lookupError = describeError(error);
        price = SENTINEL_PRICE;
        this.logger.error(`Unable to retrieve price for ticker ${asset}: ${lookupError}`);
      }

      const record: PurchaseRecord = { asset, price, quantity, expiration };
      await appendPurchaseRecord(this.options.ledgerPath, record);
      records.push(record);
      outcomes.push(lookupError === undefined ? ok(asset, record) : failed(asset, lookupError));
      this.logger.debug(`Recorded ${asset} x ${quantity} @ ${price}`);
    }

    return { status: 'completed', ledgerPath: this.options.ledgerPath, records, outcomes };
  }

  /**
   * Pair each asset with its quantity, or describe why that is impossible.
   */
  private resolveQuantities(): Array<{ asset: string; quantity: number }> | string {
    const { assets, assetPurchaseAmounts, universalPurchaseAmount, validPurchaseDays } = this.options;

    if (this.options.simulationMode === false) {
      return 'Live trading is not supported; simulationMode must be true';
    }
    if (!Number.isInteger(validPurchaseDays) || validPurchaseDays < 0) {
      return `validPurchaseDays must be a non-negative integer, got ${validPurchaseDays}`;
    }

    let quantities: number[];
    if (assetPurchaseAmounts !== undefined) {
      if (assetPurchaseAmounts.length !== assets.length) {
        return `assetPurchaseAmounts has ${assetPurchaseAmounts.length} entries for ${assets.length} assets`;
      }
      quantities = assetPurchaseAmounts;
    } else if (universalPurchaseAmount !== undefined) {
      quantities = assets.map(() => universalPurchaseAmount);
    } else {
      return 'Either assetPurchaseAmounts or universalPurchaseAmount must be specified';
    }

    const plan: Array<{ asset: string; quantity: number }> = [];
    for (const [index, asset] of assets.entries()) {
      const quantity = quantities[index];
      if (quantity === undefined || !Number.isFinite(quantity) || quantity <= 0) {
        return `Purchase amount for ${asset} must be a positive number, got ${quantity}`;
      }
      plan.push({ asset, quantity });
    }
    return plan;
  }
}
