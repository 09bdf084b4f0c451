/**
 * Tests for the Yahoo Finance price lookup
 *
 * yahoo-finance2 is mocked; chart() answers with canned daily bars.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { PriceLookupError } from './price.js';
import { YahooPriceLookup } from './yahoo.js';

const mockChart = jest.fn<(symbol: string, options: Record<string, unknown>) => Promise<unknown>>();

jest.mock('yahoo-finance2', () => ({
  __esModule: true,
  default: {
    chart: (symbol: string, options: Record<string, unknown>) => mockChart(symbol, options),
  },
}));

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('YahooPriceLookup', () => {
  beforeEach(() => {
    mockChart.mockReset();
  });

  it('should return the last finite close, skipping unfinished bars', async () => {
    mockChart.mockResolvedValue({
      quotes: [{ close: 90.5 }, { close: null }, { close: 95.25 }, { close: null }, { close: Number.NaN }],
    });

    const price = await new YahooPriceLookup({ now: () => NOW }).latestClose('MU');

    expect(price).toBe(95.25);
    expect(mockChart).toHaveBeenCalledWith('MU', {
      period1: new Date('2026-03-03T12:00:00.000Z'),
      interval: '1d',
      return: 'array',
    });
  });

  it('should request the configured lookback', async () => {
    mockChart.mockResolvedValue({ quotes: [{ close: 187.5 }] });

    await new YahooPriceLookup({ now: () => NOW, lookbackDays: 3 }).latestClose('AAPL');

    expect(mockChart.mock.calls[0]?.[1]).toMatchObject({ period1: new Date('2026-03-07T12:00:00.000Z') });
  });

  it('should throw PriceLookupError when there are no closes', async () => {
    mockChart.mockResolvedValue({ quotes: [{ close: null }] });

    const error = await new YahooPriceLookup({ now: () => NOW })
      .latestClose('MU')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PriceLookupError);
    expect(error).toMatchObject({
      message: 'No closing price for MU since 2026-03-03T12:00:00.000Z',
      symbol: 'MU',
    });
  });

  it('should wrap chart failures in PriceLookupError', async () => {
    mockChart.mockRejectedValue(new Error('Not Found'));

    const error = await new YahooPriceLookup({ now: () => NOW })
      .latestClose('ZZZZ')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PriceLookupError);
    expect(error).toMatchObject({ message: '[yahoo:chart] ZZZZ: Not Found', symbol: 'ZZZZ' });
  });
});
