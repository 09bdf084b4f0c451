/**
 * Run Summary Formatters
 *
 * CLI output for recommendation runs and simulated purchases. Each
 * formatter returns display lines; commands print them.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { PipelineResult } from '../../pipeline/runner.js';
import { countOutcomes } from '../../pipeline/types.js';
import { SENTINEL_PRICE, type PurchaseRecord, type RankedRecommendation } from '../../schemas/index.js';
import { formatLedgerNumber } from '../../purchasing/index.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Pad a string to a fixed width, ignoring ANSI colour codes.
 */
function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}

function keyValue(key: string, value: string | number): string {
  return `${chalk.dim(key + ':')} ${value}`;
}

// ============================================================================
// Recommendations
// ============================================================================

/**
 * Ranked tickers as a table; the tickers carried into a purchase are bold.
 *
 * @example
 * ```
 * RANK  TICKER    MENTIONS
 * 1     MU        2
 * 2     AAPL      1
 * ```
 */
export function formatRankedTable(ranked: RankedRecommendation[], topAssets: string[] = []): string[] {
  if (ranked.length === 0) {
    return [chalk.yellow('No recommendations found.')];
  }

  const selected = new Set(topAssets);
  const lines = [chalk.bold(padRight('RANK', 6) + padRight('TICKER', 10) + 'MENTIONS')];
  ranked.forEach(({ ticker, count }, index) => {
    const name = selected.has(ticker) ? chalk.bold(ticker) : ticker;
    lines.push(padRight(String(index + 1), 6) + padRight(name, 10) + String(count));
  });
  return lines;
}

/**
 * Counts, usage and duration of a recommendation run.
 */
export function formatRunSummary(result: PipelineResult): string[] {
  const channels = countOutcomes(result.discovery.channels);
  const transcripts = countOutcomes(result.transcripts.outcomes);
  const extractions = { ok: 0, parse_failed: 0, failed: 0 };
  for (const outcome of result.extractions) {
    extractions[outcome.status]++;
  }

  return [
    keyValue('Run', result.runId),
    keyValue(
      'Channels',
      `${channels.ok} ok, ${channels.failed} failed, ${channels.skipped} skipped`
    ),
    keyValue('Videos', result.discovery.videos.length),
    keyValue(
      'Transcripts',
      `${transcripts.ok} fetched, ${transcripts.skipped} unavailable, ${transcripts.failed} failed`
    ),
    keyValue(
      'Extractions',
      `${extractions.ok} ok, ${extractions.parse_failed} unparseable, ${extractions.failed} failed`
    ),
    keyValue('YouTube quota', `${result.usage.youtubeQuotaUnits} unit(s)`),
    keyValue(
      'LLM tokens',
      `${result.usage.llmTokens.input} in / ${result.usage.llmTokens.output} out`
    ),
    keyValue('Duration', formatDuration(result.durationMs)),
  ];
}

/**
 * JSON-friendly view of a run for `--json` output.
 */
export function toRunReport(result: PipelineResult) {
  return {
    runId: result.runId,
    startedAt: result.startedAt,
    completedAt: result.completedAt,
    window: result.discovery.window,
    videos: result.discovery.videos,
    ranked: result.ranked,
    topAssets: result.topAssets,
    usage: result.usage,
  };
}

// ============================================================================
// Purchases
// ============================================================================

/**
 * One line per ledger row written; rows with the sentinel price are flagged.
 */
export function formatPurchaseRecords(records: PurchaseRecord[]): string[] {
  return records.map((record) => {
    const price =
      record.price === SENTINEL_PRICE
        ? chalk.red('price unavailable')
        : `@ ${formatLedgerNumber(record.price)}`;
    return (
      padRight(record.asset, 8) +
      padRight(`x ${formatLedgerNumber(record.quantity)}`, 12) +
      padRight(price, 20) +
      `expires ${record.expiration}`
    );
  });
}
