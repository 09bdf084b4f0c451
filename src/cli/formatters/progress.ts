/**
 * Progress Formatters
 *
 * Stage progress display driven by the pipeline's stage observer.
 *
 * Uses the ora library for terminal spinners. Without a TTY, stages are
 * reported as plain lines instead.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import {
  STAGE_LABELS,
  STAGE_NAMES,
  type StageName,
  type StageObserver,
  type StageTiming,
} from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Stage display status for progress tracking.
 */
export type StageStatus = 'pending' | 'running' | 'completed';

export interface StageDisplay {
  name: StageName;
  status: StageStatus;
  /** Duration in milliseconds (if completed) */
  durationMs?: number;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Spinner for one running stage.
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime = 0;

  constructor(text: string) {
    this.spinner = ora({
      text,
      color: 'cyan',
      isEnabled: process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Pipeline stage progress with a spinner per running stage.
 *
 * Pass it as the pipeline's `observer`:
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay();
 * const result = await runRecommendationPipeline(config, { ...deps, observer: progress });
 * progress.stopAll();
 * ```
 */
export class StageProgressDisplay implements StageObserver {
  private readonly stages = new Map<StageName, StageDisplay>();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor(options: { isTTY?: boolean } = {}) {
    this.isTTY = options.isTTY ?? process.stdout.isTTY === true;
    for (const name of STAGE_NAMES) {
      this.stages.set(name, { name, status: 'pending' });
    }
  }

  onStageStart(stage: StageName): void {
    this.setStatus(stage, 'running');

    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(`${STAGE_LABELS[stage]}...`).start();
    } else {
      console.log(`[*] ${STAGE_LABELS[stage]}...`);
    }
  }

  onStageComplete(stage: StageName, timing: StageTiming): void {
    const display = this.setStatus(stage, 'completed');
    display.durationMs = timing.durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${STAGE_LABELS[stage]} complete`);
      this.currentSpinner = null;
    } else {
      console.log(`[+] ${STAGE_LABELS[stage]} (${formatDuration(timing.durationMs)})`);
    }
  }

  /**
   * Stop a spinner left running by a stage that threw.
   */
  stopAll(): void {
    if (this.currentSpinner) {
      this.currentSpinner.fail();
      this.currentSpinner = null;
    }
  }

  getStages(): StageDisplay[] {
    return STAGE_NAMES.map((name) => this.stages.get(name) ?? { name, status: 'pending' });
  }

  private setStatus(stage: StageName, status: StageStatus): StageDisplay {
    const display = this.stages.get(stage) ?? { name: stage, status };
    display.status = status;
    this.stages.set(stage, display);
    return display;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
