/**
 * Yahoo Finance Price Lookup
 *
 * Latest daily close from Yahoo's chart endpoint via yahoo-finance2.
 * A few days of bars are requested so that weekends and market
 * holidays still resolve to the previous session's close.
 *
 * @module purchasing/yahoo
 */

import yahooFinance from 'yahoo-finance2';
import { describeError } from '../pipeline/types.js';
import { PriceLookupError, type PriceLookup } from './price.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface YahooPriceLookupOptions {
  /** Calendar days of daily bars to request (default: 7) */
  lookbackDays?: number;
  /** Clock, injectable for deterministic requests */
  now?: () => Date;
}

export class YahooPriceLookup implements PriceLookup {
  private readonly lookbackDays: number;
  private readonly now: () => Date;

  constructor(options: YahooPriceLookupOptions = {}) {
    this.lookbackDays = options.lookbackDays ?? 7;
    this.now = options.now ?? (() => new Date());
  }

  async latestClose(symbol: string): Promise<number> {
    const period1 = new Date(this.now().getTime() - this.lookbackDays * DAY_MS);

    const closes = await this.fetchDailyCloses(symbol, period1);
    const latest = closes[closes.length - 1];
    if (latest === undefined) {
      throw new PriceLookupError(`No closing price for ${symbol} since ${period1.toISOString()}`, symbol);
    }
    return latest;
  }

  /**
   * Finite closes in chronological order. Bars without a close
   * (the current, unfinished session) are skipped.
   */
  private async fetchDailyCloses(symbol: string, period1: Date): Promise<number[]> {
    try {
      const chart = await yahooFinance.chart(symbol, { period1, interval: '1d', return: 'array' });
      const closes: number[] = [];
      for (const quote of chart.quotes) {
        if (typeof quote.close === 'number' && Number.isFinite(quote.close)) {
          closes.push(quote.close);
        }
      }
      return closes;
    } catch (error) {
      throw new PriceLookupError(`[yahoo:chart] ${symbol}: ${describeError(error)}`, symbol);
    }
  }
}
