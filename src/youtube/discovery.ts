/**
 * Video Discovery
 *
 * For each channel, in priority order, resolves the uploads feed and
 * selects the videos published inside the recency window.
 *
 * Error Handling:
 * - Channel lookup or paging failure: channel is reported failed, others continue
 * - Quota exceeded: remaining channels are reported skipped
 *
 * @module youtube/discovery
 */

import { ConfigurationError } from '../config/index.js';
import { silentLogger, type Logger } from '../logging/index.js';
import {
  collectOk,
  describeError,
  failed,
  ok,
  skipped,
  type ItemOutcome,
} from '../pipeline/types.js';
import type { ChannelEntry, VideoRef } from '../schemas/index.js';
import { isQuotaExceededError, type VideoFeedService } from './client.js';
import { recencyWindow, scanFeed } from './feed.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for a discovery pass
 */
export interface DiscoveryOptions {
  /** Trailing window in days */
  windowDays: number;
  /** Reference time; injectable for deterministic or simulated runs */
  now?: Date;
}

export interface DiscoveryDependencies {
  feed: VideoFeedService;
  logger?: Logger;
}

/**
 * Videos found for one channel
 */
export interface ChannelDiscovery {
  channel: ChannelEntry;
  videos: VideoRef[];
  pagesFetched: number;
}

export type ChannelOutcome = ItemOutcome<ChannelDiscovery>;

export interface DiscoveryResult {
  /** In-window videos grouped by channel (priority order), newest first within a channel */
  videos: VideoRef[];
  /** One outcome per input channel, in input order */
  channels: ChannelOutcome[];
  /** Window bounds as ISO8601 */
  window: {
    start: string;
    end: string;
  };
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Discover recent uploads for a list of channels.
 *
 * @param channels - Channels in processing order
 * @param options - Window size and reference time
 * @param deps - Feed service and logger
 * @throws ConfigurationError if the window is not a positive number of days
 *
 * @example
 * ```typescript
 * const result = await discoverVideos(channels, { windowDays: 5 }, { feed: client });
 * console.log(`${result.videos.length} videos to process`);
 * ```
 */
export async function discoverVideos(
  channels: ChannelEntry[],
  options: DiscoveryOptions,
  deps: DiscoveryDependencies
): Promise<DiscoveryResult> {
  if (!Number.isFinite(options.windowDays) || options.windowDays <= 0) {
    throw new ConfigurationError(
      `Recency window must be a positive number of days, got ${options.windowDays}`
    );
  }

  const logger = deps.logger ?? silentLogger;
  const window = recencyWindow(options.now ?? new Date(), options.windowDays);
  const outcomes: ChannelOutcome[] = [];
  let quotaExhausted = false;

  for (const channel of channels) {
    if (quotaExhausted) {
      outcomes.push(skipped(channel.channelId, 'YouTube API quota exceeded earlier in this run'));
      continue;
    }

    try {
      const playlistId = await deps.feed.getUploadsPlaylistId(channel.channelId);
      const scan = await scanFeed(deps.feed, playlistId, window);

      const videos: VideoRef[] = scan.items.map((item) => ({
        videoId: item.videoId,
        publishedAt: item.publishedAt,
        channelId: channel.channelId,
        title: item.title,
      }));

      if (scan.futureItems > 0) {
        logger.debug(`${channel.name}: ignored ${scan.futureItems} item(s) dated after now`);
      }
      if (scan.undatedItems > 0) {
        logger.warn(`${channel.name}: ignored ${scan.undatedItems} item(s) without a valid publish date`);
      }
      logger.info(
        `${channel.name}: ${videos.length} recent video(s) across ${scan.pagesFetched} page(s)`
      );

      outcomes.push(ok(channel.channelId, { channel, videos, pagesFetched: scan.pagesFetched }));
    } catch (error) {
      const reason = describeError(error);
      logger.warn(`${channel.name} (${channel.channelId}): discovery failed: ${reason}`);
      outcomes.push(failed(channel.channelId, reason));

      if (isQuotaExceededError(error)) {
        quotaExhausted = true;
      }
    }
  }

  return {
    videos: collectOk(outcomes).flatMap((discovery) => discovery.videos),
    channels: outcomes,
    window: {
      start: window.start.toISOString(),
      end: window.end.toISOString(),
    },
  };
}
