/**
 * Pipeline Runner Tests
 *
 * End-to-end runs over in-memory feed, transcript and model fakes.
 */

import { describe, it, expect, jest } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';
import { ChannelListError } from '../channels/index.js';
import { ConfigurationError, loadConfig } from '../config/index.js';
import {
  RecommendationExtractor,
  type CompletionModel,
  type CompletionResult,
} from '../extraction/index.js';
import { createMemoryLogger } from '../logging/index.js';
import type { ChannelEntry, TranscriptSegment } from '../schemas/index.js';
import {
  TranscriptError,
  type FeedPage,
  type QuotaUsage,
  type TranscriptFetcher,
  type VideoFeedService,
} from '../youtube/index.js';
import { generateRunId, runRecommendationPipeline, type PipelineDependencies } from './runner.js';
import { STAGE_NAMES, type StageName } from './types.js';

// ============================================================================
// Fakes
// ============================================================================

const NOW = new Date('2026-03-10T12:00:00.000Z');
const config = loadConfig({});

const CHANNELS: ChannelEntry[] = [
  { name: 'Alpha', channelId: 'UC1', priority: 5 },
  { name: 'Beta', channelId: 'UC2', priority: 1 },
];

/**
 * Single-page feeds keyed by channel id, metered one unit per call.
 */
class MeteredFeed implements VideoFeedService {
  private calls = 0;

  constructor(private readonly pages: Record<string, FeedPage>) {}

  async getUploadsPlaylistId(channelId: string): Promise<string> {
    this.calls++;
    return channelId;
  }

  async listPlaylistItems(playlistId: string): Promise<FeedPage> {
    this.calls++;
    return this.pages[playlistId] ?? { items: [] };
  }

  getQuotaUsage(): QuotaUsage {
    return { totalUnits: this.calls, channelCalls: 0, playlistCalls: 0 };
  }
}

const feedPages: Record<string, FeedPage> = {
  UC1: {
    items: [
      { videoId: 'v1', publishedAt: '2026-03-09T12:00:00Z', title: 'Picks for March' },
      { videoId: 'v2', publishedAt: '2026-03-08T12:00:00Z', title: 'Q&A' },
      { videoId: 'old', publishedAt: '2026-02-28T12:00:00Z', title: 'Old picks' },
    ],
    nextPageToken: 'never-requested',
  },
  UC2: {
    items: [{ videoId: 'v3', publishedAt: '2026-03-09T18:00:00Z', title: 'Chip stocks' }],
  },
};

const segments: TranscriptSegment[] = [{ text: 'Here is what I am buying', offset: 0, duration: 3 }];

const transcriptFetcher: TranscriptFetcher = {
  async fetchSegments(videoId: string): Promise<TranscriptSegment[]> {
    if (videoId === 'v2') {
      throw new TranscriptError('Transcript is disabled on this video', videoId, true);
    }
    return segments;
  },
};

/**
 * Replies by the video id embedded in the prompt.
 */
const model: CompletionModel = {
  modelId: 'fake-model',
  async complete(prompt: string): Promise<CompletionResult> {
    const text = prompt.includes('(id v1)')
      ? '{"recommended_stocks": ["AAPL", "MU"]}'
      : '```json\n{"recommended_stocks": ["MU", "TSM"]}\n```';
    return { text, modelId: 'fake-model', tokenUsage: { input: 100, output: 10 } };
  },
};

function dependencies(overrides: Partial<PipelineDependencies> = {}): PipelineDependencies {
  return {
    feed: new MeteredFeed(feedPages),
    transcripts: transcriptFetcher,
    extractor: new RecommendationExtractor(model),
    loadChannels: async () => CHANNELS,
    ...overrides,
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('runRecommendationPipeline', () => {
  it('should rank tickers across all transcripts', async () => {
    const result = await runRecommendationPipeline(config, dependencies(), { now: NOW, maxAssets: 2 });

    expect(result.discovery.videos.map((v) => v.videoId)).toEqual(['v1', 'v2', 'v3']);
    expect(result.transcripts.transcripts.map((t) => t.videoId)).toEqual(['v1', 'v3']);
    expect(result.extractions.map((e) => e.tickers)).toEqual([
      ['AAPL', 'MU'],
      ['MU', 'TSM'],
    ]);
    expect(result.ranked).toEqual([
      { ticker: 'MU', count: 2 },
      { ticker: 'AAPL', count: 1 },
      { ticker: 'TSM', count: 1 },
    ]);
    expect(result.topAssets).toEqual(['MU', 'AAPL']);
  });

  it('should report usage and stage timings', async () => {
    const result = await runRecommendationPipeline(config, dependencies(), { now: NOW });

    expect(result.usage).toEqual({ youtubeQuotaUnits: 4, llmTokens: { input: 200, output: 20 } });
    expect(result.stageTimings.map((t) => t.stage)).toEqual([...STAGE_NAMES]);
    expect(result.runId).toMatch(/^\d{8}-\d{6}$/);
    expect(result.topAssets).toEqual(['MU', 'AAPL', 'TSM']);
  });

  it('should notify the observer for every stage', async () => {
    const started: StageName[] = [];
    const completed: StageName[] = [];

    await runRecommendationPipeline(
      config,
      dependencies({
        observer: {
          onStageStart: (stage) => started.push(stage),
          onStageComplete: (stage) => completed.push(stage),
        },
      }),
      { now: NOW }
    );

    expect(started).toEqual([...STAGE_NAMES]);
    expect(completed).toEqual([...STAGE_NAMES]);
  });

  it('should log progress for each stage', async () => {
    const logger = createMemoryLogger();

    await runRecommendationPipeline(config, dependencies({ logger }), { now: NOW, windowDays: 5 });

    expect(logger.entries.filter((e) => e.level === 'info').map((e) => e.message)).toEqual([
      'Loaded 2 channel(s) from data/source_youtubers.csv',
      'Alpha: 2 recent video(s) across 1 page(s)',
      'Beta: 1 recent video(s) across 1 page(s)',
      'Found 3 video(s) from the last 5 day(s) (2 channel(s) ok, 0 failed, 0 skipped)',
      'Fetched 2 of 3 transcript(s)',
      'Ranked 3 ticker(s) from 2 transcript(s)',
    ]);
  });

  it('should finish with an empty ranking when nothing is found', async () => {
    const result = await runRecommendationPipeline(
      config,
      dependencies({ feed: new MeteredFeed({}) }),
      { now: NOW }
    );

    expect(result.discovery.videos).toEqual([]);
    expect(result.ranked).toEqual([]);
    expect(result.topAssets).toEqual([]);
  });

  it('should reject invalid overrides before loading channels', async () => {
    const loadChannels = jest.fn(async (_filePath: string) => CHANNELS);

    await expect(
      runRecommendationPipeline(config, dependencies({ loadChannels }), { windowDays: 0 })
    ).rejects.toThrow(new ConfigurationError('windowDays must be a positive integer, got 0'));
    expect(loadChannels).not.toHaveBeenCalled();
  });

  it('should fail on a missing channel list before any remote call', async () => {
    const feed = new MeteredFeed(feedPages);
    const missing = path.join(os.tmpdir(), 'creator-signals-missing', 'channels.csv');

    await expect(
      runRecommendationPipeline(config, { ...dependencies({ feed }), loadChannels: undefined }, {
        channelsFile: missing,
      })
    ).rejects.toThrow(ChannelListError);
    expect(feed.getQuotaUsage().totalUnits).toBe(0);
  });
});

describe('generateRunId', () => {
  it('should format the local start time', () => {
    expect(generateRunId(new Date(2026, 2, 10, 9, 5, 7))).toBe('20260310-090507');
  });
});
