/**
 * Recommend Command
 *
 * Runs the recommendation pipeline and prints the ranked tickers.
 *
 * @module cli/commands/recommend
 */

import type { Command } from 'commander';
import type { AppConfig } from '../../config/index.js';
import { runRecommendationPipeline, type PipelineResult } from '../../pipeline/index.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import {
  StageProgressDisplay,
  formatRankedTable,
  formatRunSummary,
  toRunReport,
} from '../formatters/index.js';
import { parsePositiveInt } from '../options.js';
import type { CliServices } from '../services.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the recommend command (shared with `run`).
 */
export interface RecommendOptions {
  /** Channel list CSV */
  channels?: string;
  windowDays?: number;
  maxAssets?: number;
  /** Print a JSON report instead of tables */
  json?: boolean;
}

// ============================================================================
// Shared Helpers
// ============================================================================

export function addRecommendOptions(cmd: Command): Command {
  return cmd
    .option('-c, --channels <file>', 'Channel list CSV (default: CREATOR_SIGNALS_CHANNELS_FILE)')
    .option('-w, --window-days <n>', 'Only consider uploads from the last n days', parsePositiveInt)
    .option('-n, --max-assets <n>', 'Number of top tickers to select', parsePositiveInt)
    .option('--json', 'Print the result as JSON');
}

/**
 * Run the pipeline with stage progress (unless printing JSON or quiet).
 */
export async function executeRecommendation(
  base: BaseCommand,
  services: CliServices,
  config: AppConfig,
  options: RecommendOptions
): Promise<PipelineResult> {
  const json = options.json === true;
  base.debug(`Channel list: ${options.channels ?? config.channelsFile}`);
  base.debug(`Extraction model: ${config.models.extraction}`);
  const deps = await services.createPipelineDependencies(config, base.logger(json));
  const progress = json || base.isQuiet() ? undefined : new StageProgressDisplay();

  try {
    return await runRecommendationPipeline(
      config,
      { ...deps, observer: progress },
      {
        channelsFile: options.channels,
        windowDays: options.windowDays,
        maxAssets: options.maxAssets,
      }
    );
  } finally {
    progress?.stopAll();
  }
}

export function printRecommendation(base: BaseCommand, result: PipelineResult): void {
  base.section('Recommended tickers');
  for (const line of formatRankedTable(result.ranked, result.topAssets)) {
    base.info(line);
  }

  base.section('Run summary');
  for (const line of formatRunSummary(result)) {
    base.info(line);
  }
  base.blank();
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerRecommendCommand(program: Command, services: CliServices): void {
  addRecommendOptions(
    program
      .command('recommend')
      .description('Extract ticker recommendations from recent creator videos')
  ).action(async (options: RecommendOptions, cmd: Command) => {
    const base = getBaseCommand(cmd);

    let result: PipelineResult;
    try {
      const config = services.loadConfig();
      result = await executeRecommendation(base, services, config, options);
    } catch (error) {
      return base.handleError(error);
    }

    if (options.json) {
      base.json(toRunReport(result));
      return;
    }
    printRecommendation(base, result);
    base.success(`Top assets: ${result.topAssets.length > 0 ? result.topAssets.join(', ') : '(none)'}`);
  });
}
