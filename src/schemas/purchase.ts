/**
 * Purchase Schemas - simulated purchase ledger rows
 */

import { z } from 'zod';

/**
 * Price recorded when the market-data lookup fails.
 * Distinct from a legitimate zero price.
 */
export const SENTINEL_PRICE = -1.0;

/**
 * Expiration dates are written as YYYY/MM/DD.
 */
export const LedgerDateSchema = z
  .string()
  .regex(/^\d{4}\/\d{2}\/\d{2}$/, 'Expiration must be in YYYY/MM/DD format');

export const PurchaseRecordSchema = z.object({
  asset: z.string().min(1),
  /** Latest close, or {@link SENTINEL_PRICE} if the lookup failed */
  price: z.number(),
  quantity: z.number().positive(),
  expiration: LedgerDateSchema,
});

export type PurchaseRecord = z.infer<typeof PurchaseRecordSchema>;
