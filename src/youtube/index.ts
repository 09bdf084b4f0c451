/**
 * YouTube Module
 *
 * Uploads-feed discovery and transcript retrieval. The youtube-transcript
 * backed fetcher is in `./transcript-fetcher.js`.
 *
 * @module youtube
 */

export {
  YouTubeClient,
  YouTubeApiError,
  FEED_PAGE_SIZE,
  parsePlaylistItemsResponse,
  isQuotaExceededError,
  type FeedItem,
  type FeedPage,
  type VideoFeedService,
  type QuotaUsage,
  type YouTubeClientOptions,
  type YouTubePlaylistItemsResponse,
} from './client.js';

export {
  recencyWindow,
  isBeforeWindow,
  isInWindow,
  iterateFeedPages,
  scanFeed,
  type RecencyWindow,
  type FeedScan,
} from './feed.js';

export {
  discoverVideos,
  type DiscoveryOptions,
  type DiscoveryDependencies,
  type ChannelDiscovery,
  type ChannelOutcome,
  type DiscoveryResult,
} from './discovery.js';

export {
  retrieveTranscripts,
  combineSegments,
  cleanTranscriptText,
  transcriptDuration,
  isTranscriptUnavailableError,
  TranscriptError,
  type TranscriptFetcher,
  type TranscriptRetrievalResult,
} from './transcript.js';
