/**
 * Recommendation Aggregation
 *
 * Merges per-transcript ticker lists into one ranking by how many times
 * each ticker was recommended across the run.
 *
 * Tickers are counted verbatim: "aapl" and "AAPL" are different entries.
 *
 * @module aggregation/aggregator
 */

import type { RankedRecommendation } from '../schemas/index.js';

/**
 * Ticker to occurrence count. Iteration order is first occurrence.
 */
export type RecommendationSet = ReadonlyMap<string, number>;

/**
 * Count tickers across lists, concatenated in the given order.
 *
 * A ticker repeated inside one list counts once per repetition.
 */
export function countRecommendations(lists: readonly (readonly string[])[]): RecommendationSet {
  const counts = new Map<string, number>();
  for (const list of lists) {
    for (const ticker of list) {
      counts.set(ticker, (counts.get(ticker) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Rank a recommendation set by descending count.
 * Equal counts keep first-occurrence order (Array.prototype.sort is stable).
 */
export function rankRecommendations(set: RecommendationSet): RankedRecommendation[] {
  return Array.from(set, ([ticker, count]) => ({ ticker, count })).sort(
    (a, b) => b.count - a.count
  );
}

/**
 * Unique tickers ordered by descending frequency across all lists.
 *
 * @example
 * ```typescript
 * aggregateRecommendations([['AAPL', 'MU'], ['MU', 'TSM'], ['AAPL']]);
 * // ['AAPL', 'MU', 'TSM']
 * ```
 */
export function aggregateRecommendations(lists: readonly (readonly string[])[]): string[] {
  return rankRecommendations(countRecommendations(lists)).map((r) => r.ticker);
}

/**
 * First `n` tickers of a ranking.
 */
export function topTickers(ranked: readonly RankedRecommendation[], n: number): string[] {
  return ranked.slice(0, Math.max(0, n)).map((r) => r.ticker);
}
