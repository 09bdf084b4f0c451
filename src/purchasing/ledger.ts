/**
 * Purchase Ledger
 *
 * Append-only CSV-like file of simulated purchases. Rows are
 * `asset, price, quantity, YYYY/MM/DD`; the file has no header, is
 * never truncated, and repeated purchases produce repeated rows.
 *
 * @module purchasing/ledger
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PurchaseRecordSchema, type PurchaseRecord } from '../schemas/index.js';

/**
 * Error thrown when an existing ledger row cannot be read back
 */
export class LedgerFormatError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`Line ${line}: ${message}`);
    this.name = 'LedgerFormatError';
  }
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Integral values keep one decimal place (`1000.0`, `-1.0`);
 * everything else uses the shortest round-trip form.
 */
export function formatLedgerNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Local calendar date as YYYY/MM/DD.
 */
export function formatLedgerDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}/${month}/${day}`;
}

/**
 * Expiration date `days` calendar days after `now`, formatted for the ledger.
 */
export function expirationDate(now: Date, days: number): string {
  const expires = new Date(now.getTime());
  expires.setDate(expires.getDate() + days);
  return formatLedgerDate(expires);
}

export function formatLedgerRow(record: PurchaseRecord): string {
  return (
    [
      record.asset,
      formatLedgerNumber(record.price),
      formatLedgerNumber(record.quantity),
      record.expiration,
    ].join(', ') + '\n'
  );
}

// ============================================================================
// File Operations
// ============================================================================

/**
 * Append one record, creating the file and its directory if needed.
 */
export async function appendPurchaseRecord(ledgerPath: string, record: PurchaseRecord): Promise<void> {
  await fs.mkdir(path.dirname(ledgerPath), { recursive: true });
  await fs.appendFile(ledgerPath, formatLedgerRow(record), 'utf-8');
}

/**
 * Parse ledger text into records. Blank lines are ignored.
 *
 * @throws LedgerFormatError on a malformed row
 */
export function parseLedger(content: string): PurchaseRecord[] {
  const records: PurchaseRecord[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }

    const cells = line.split(',').map((cell) => cell.trim());
    if (cells.length !== 4) {
      throw new LedgerFormatError(`Expected 4 columns, got ${cells.length}`, index + 1);
    }

    const [asset, price, quantity, expiration] = cells;
    const result = PurchaseRecordSchema.safeParse({
      asset,
      price: Number(price),
      quantity: Number(quantity),
      expiration,
    });
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new LedgerFormatError(
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid row',
        index + 1
      );
    }
    records.push(result.data);
  });

  return records;
}

/**
 * Read all records of a ledger. A missing ledger has no records.
 */
export async function readLedger(ledgerPath: string): Promise<PurchaseRecord[]> {
  let content: string;
  try {
    content = await fs.readFile(ledgerPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
  return parseLedger(content);
}
