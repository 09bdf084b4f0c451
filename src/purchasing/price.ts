/**
 * Price Lookup
 *
 * @module purchasing/price
 */

/**
 * Market-data source for the latest closing price of a ticker.
 */
export interface PriceLookup {
  /**
   * @throws PriceLookupError when no price is available
   */
  latestClose(symbol: string): Promise<number>;
}

/**
 * Error thrown when a price cannot be retrieved
 */
export class PriceLookupError extends Error {
  constructor(
    message: string,
    public readonly symbol: string
  ) {
    super(message);
    this.name = 'PriceLookupError';
  }
}
