/**
 * Option Parsers
 *
 * Commander argument parsers shared by the commands. Invalid values raise
 * commander's InvalidArgumentError, which the program reports as a usage
 * error.
 *
 * @module cli/options
 */

import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

/**
 * Comma-separated quantities, e.g. `10,2.5`.
 */
export function parseAmountList(value: string): number[] {
  const parts = value.split(',').map((part) => part.trim());
  if (parts.some((part) => part === '')) {
    throw new InvalidArgumentError('Expected a comma-separated list of positive numbers.');
  }
  return parts.map((part) => {
    const parsed = Number(part);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new InvalidArgumentError(`"${part}" is not a positive number.`);
    }
    return parsed;
  });
}

/**
 * Tickers as typed on the command line: trimmed and upper-cased.
 */
export function normalizeTickers(values: string[]): string[] {
  return values.map((value) => value.trim().toUpperCase()).filter((value) => value !== '');
}
