/**
 * Pipeline Type Definitions
 *
 * Shared result types for the recommendation pipeline. Per-item work
 * (a channel, a video, a transcript, an asset) reports an {@link ItemOutcome}
 * instead of throwing, so one bad item never stops a run.
 *
 * @module pipeline/types
 */

// ============================================================================
// Item Outcomes
// ============================================================================

/**
 * Result of processing one item.
 *
 * @typeParam T - Value produced on success
 */
export type ItemOutcome<T> =
  | { status: 'ok'; id: string; value: T }
  | { status: 'skipped'; id: string; reason: string }
  | { status: 'failed'; id: string; reason: string };

export type ItemStatus = ItemOutcome<unknown>['status'];

export function ok<T>(id: string, value: T): ItemOutcome<T> {
  return { status: 'ok', id, value };
}

export function skipped<T>(id: string, reason: string): ItemOutcome<T> {
  return { status: 'skipped', id, reason };
}

export function failed<T>(id: string, reason: string): ItemOutcome<T> {
  return { status: 'failed', id, reason };
}

/**
 * Values of the successful outcomes, in order.
 */
export function collectOk<T>(outcomes: ItemOutcome<T>[]): T[] {
  const values: T[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'ok') {
      values.push(outcome.value);
    }
  }
  return values;
}

/**
 * Count outcomes by status.
 */
export function countOutcomes(outcomes: ItemOutcome<unknown>[]): Record<ItemStatus, number> {
  const counts: Record<ItemStatus, number> = { ok: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

/**
 * Human-readable message for any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Stages
// ============================================================================

/**
 * Stages of a recommendation run, in execution order.
 */
export const STAGE_NAMES = [
  'channels',
  'discovery',
  'transcripts',
  'extraction',
  'aggregation',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/**
 * Human-readable labels for each stage.
 */
export const STAGE_LABELS: Record<StageName, string> = {
  channels: 'Load channels',
  discovery: 'Discover videos',
  transcripts: 'Fetch transcripts',
  extraction: 'Extract tickers',
  aggregation: 'Rank tickers',
};

/**
 * Execution timing for one stage.
 */
export interface StageTiming {
  stage: StageName;
  /** ISO8601 timestamp when stage started */
  startedAt: string;
  /** ISO8601 timestamp when stage completed */
  completedAt: string;
  /** Duration in milliseconds */
  durationMs: number;
}

/**
 * Observer for stage progress, used by the CLI spinner.
 */
export interface StageObserver {
  onStageStart?(stage: StageName): void;
  onStageComplete?(stage: StageName, timing: StageTiming): void;
}

// ============================================================================
// Usage
// ============================================================================

/**
 * Remote usage accumulated during a run.
 */
export interface UsageSummary {
  /** YouTube Data API quota units consumed */
  youtubeQuotaUnits: number;
  /** LLM tokens consumed by extraction */
  llmTokens: {
    input: number;
    output: number;
  };
}
