/**
 * Purchasing Module
 *
 * Simulated purchases and the append-only ledger. The Yahoo Finance
 * lookup lives in `./yahoo.js` and is not re-exported here.
 *
 * @module purchasing
 */

export {
  AssetPurchaser,
  type AssetPurchaserOptions,
  type PurchaserDependencies,
  type PurchaseResult,
} from './purchaser.js';

export {
  appendPurchaseRecord,
  expirationDate,
  formatLedgerDate,
  formatLedgerNumber,
  formatLedgerRow,
  parseLedger,
  readLedger,
  LedgerFormatError,
} from './ledger.js';

export { PriceLookupError, type PriceLookup } from './price.js';
