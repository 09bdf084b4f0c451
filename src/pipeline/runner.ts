/**
 * Recommendation Pipeline Runner
 *
 * Runs the five recommendation stages in order:
 * channels → discovery → transcripts → extraction → aggregation.
 *
 * Configuration problems throw {@link ConfigurationError} before any remote
 * call. Per-item failures are recorded in the stage results and the run
 * continues, so a run always completes with whatever it could gather.
 *
 * @module pipeline/runner
 */

import { countRecommendations, rankRecommendations, topTickers } from '../aggregation/index.js';
import { loadChannels as loadChannelFile } from '../channels/index.js';
import { ConfigurationError, type AppConfig } from '../config/index.js';
import type { ExtractionOutcome, RecommendationExtractor } from '../extraction/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import type { ChannelEntry, RankedRecommendation } from '../schemas/index.js';
import {
  discoverVideos,
  retrieveTranscripts,
  type DiscoveryResult,
  type TranscriptFetcher,
  type TranscriptRetrievalResult,
  type VideoFeedService,
} from '../youtube/index.js';
import {
  STAGE_LABELS,
  countOutcomes,
  type StageName,
  type StageObserver,
  type StageTiming,
  type UsageSummary,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Services the pipeline calls out to. Built by `createPipelineDependencies`
 * for real runs; tests pass in-memory fakes.
 */
export interface PipelineDependencies {
  feed: VideoFeedService;
  transcripts: TranscriptFetcher;
  extractor: RecommendationExtractor;
  logger?: Logger;
  observer?: StageObserver;
  /** Channel list reader (default: read and parse `channelsFile`) */
  loadChannels?: (filePath: string) => Promise<ChannelEntry[]>;
}

/**
 * Per-run overrides of the configuration
 */
export interface PipelineOptions {
  channelsFile?: string;
  windowDays?: number;
  maxAssets?: number;
  /** Reference time for the recency window */
  now?: Date;
}

export interface PipelineResult {
  runId: string;
  /** ISO8601 */
  startedAt: string;
  /** ISO8601 */
  completedAt: string;
  durationMs: number;
  channels: ChannelEntry[];
  discovery: DiscoveryResult;
  transcripts: TranscriptRetrievalResult;
  extractions: ExtractionOutcome[];
  /** Unique tickers by descending count */
  ranked: RankedRecommendation[];
  /** First `maxAssets` tickers of `ranked` */
  topAssets: string[];
  usage: UsageSummary;
  stageTimings: StageTiming[];
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run ID derived from the start time, e.g. `20260310-090000`.
 */
export function generateRunId(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Run discovery, transcripts, extraction and ranking for every configured channel.
 *
 * @throws ConfigurationError for invalid overrides or an unreadable channel list
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const deps = createPipelineDependencies(config, logger);
 * const result = await runRecommendationPipeline(config, deps);
 * console.log(result.topAssets);
 * ```
 */
export async function runRecommendationPipeline(
  config: AppConfig,
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const windowDays = requirePositiveInteger('windowDays', options.windowDays ?? config.recencyWindowDays);
  const maxAssets = requirePositiveInteger('maxAssets', options.maxAssets ?? config.maxAssets);
  const channelsFile = options.channelsFile ?? config.channelsFile;

  const logger = deps.logger ?? silentLogger;
  const loadChannels = deps.loadChannels ?? loadChannelFile;
  const start = new Date();
  const runId = generateRunId(start);
  const stageTimings: StageTiming[] = [];
  const quotaBefore = deps.feed.getQuotaUsage?.().totalUnits ?? 0;

  const stage = async <T>(name: StageName, fn: () => Promise<T>): Promise<T> => {
    const stageStart = Date.now();
    deps.observer?.onStageStart?.(name);
    logger.debug(`[${runId}] ${STAGE_LABELS[name]}...`);

    const value = await fn();

    const timing: StageTiming = {
      stage: name,
      startedAt: new Date(stageStart).toISOString(),
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - stageStart,
    };
    stageTimings.push(timing);
    deps.observer?.onStageComplete?.(name, timing);
    logger.debug(`[${runId}] ${STAGE_LABELS[name]} done in ${timing.durationMs}ms`);
    return value;
  };

  const channels = await stage('channels', () => loadChannels(channelsFile));
  logger.info(`Loaded ${channels.length} channel(s) from ${channelsFile}`);

  const discovery = await stage('discovery', () =>
    discoverVideos(
      channels,
      options.now ? { windowDays, now: options.now } : { windowDays },
      { feed: deps.feed, logger }
    )
  );
  const channelCounts = countOutcomes(discovery.channels);
  logger.info(
    `Found ${discovery.videos.length} video(s) from the last ${windowDays} day(s) ` +
      `(${channelCounts.ok} channel(s) ok, ${channelCounts.failed} failed, ${channelCounts.skipped} skipped)`
  );

  const transcripts = await stage('transcripts', () =>
    retrieveTranscripts(discovery.videos, { fetcher: deps.transcripts, logger })
  );
  logger.info(`Fetched ${transcripts.transcripts.length} of ${discovery.videos.length} transcript(s)`);

  const batch = await stage('extraction', () => deps.extractor.extractAll(transcripts.transcripts));

  const ranked = await stage('aggregation', async () =>
    rankRecommendations(countRecommendations(batch.tickerLists))
  );
  const topAssets = topTickers(ranked, maxAssets);
  logger.info(`Ranked ${ranked.length} ticker(s) from ${transcripts.transcripts.length} transcript(s)`);

  const completed = new Date();
  return {
    runId,
    startedAt: start.toISOString(),
    completedAt: completed.toISOString(),
    durationMs: completed.getTime() - start.getTime(),
    channels,
    discovery,
    transcripts,
    extractions: batch.outcomes,
    ranked,
    topAssets,
    usage: {
      youtubeQuotaUnits: (deps.feed.getQuotaUsage?.().totalUnits ?? 0) - quotaBefore,
      llmTokens: batch.tokenUsage,
    },
    stageTimings,
  };
}
