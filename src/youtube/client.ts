/**
 * YouTube Data API Client
 *
 * Low-level client for the YouTube Data API v3.
 * Resolves a channel's uploads playlist and pages through it,
 * tracking quota usage and detecting quota exceeded errors.
 *
 * @module youtube/client
 */

// ============================================================================
// Types
// ============================================================================

/**
 * One item from a channel's uploads feed
 */
export interface FeedItem {
  /** Video ID */
  videoId: string;
  /** When the video was published (ISO8601) */
  publishedAt: string;
  /** Video title */
  title: string;
}

/**
 * One page of an uploads feed, newest first
 */
export interface FeedPage {
  items: FeedItem[];
  /** Token for the next (older) page, absent on the last page */
  nextPageToken?: string;
}

/**
 * The two feed calls discovery needs. Implemented by {@link YouTubeClient};
 * tests supply an in-memory version.
 */
export interface VideoFeedService {
  /** Resolve the uploads playlist id of a channel */
  getUploadsPlaylistId(channelId: string): Promise<string>;
  /** Fetch one page of a playlist */
  listPlaylistItems(playlistId: string, pageToken?: string): Promise<FeedPage>;
  /** Quota consumed so far, for services that meter calls */
  getQuotaUsage?(): QuotaUsage;
}

/**
 * Quota usage tracking
 */
export interface QuotaUsage {
  /** Total units consumed */
  totalUnits: number;
  /** channels.list calls made (1 unit each) */
  channelCalls: number;
  /** playlistItems.list calls made (1 unit each) */
  playlistCalls: number;
}

/**
 * Options for the client
 */
export interface YouTubeClientOptions {
  /** YouTube Data API key */
  apiKey: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** API base URL, overridable for tests */
  baseUrl?: string;
  /** fetch implementation, defaults to the global */
  fetch?: typeof fetch;
}

/**
 * YouTube API error with additional context
 */
export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isQuotaExceeded: boolean = false
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

// ============================================================================
// API Response Types (Internal)
// ============================================================================

interface YouTubeChannelsResponse {
  items?: Array<{
    id: string;
    contentDetails?: {
      relatedPlaylists?: {
        uploads?: string;
      };
    };
  }>;
}

export interface YouTubePlaylistItemsResponse {
  nextPageToken?: string;
  items?: Array<{
    snippet?: {
      publishedAt?: string;
      title?: string;
      resourceId?: {
        kind?: string;
        videoId?: string;
      };
    };
    contentDetails?: {
      videoId?: string;
      videoPublishedAt?: string;
    };
  }>;
}

// ============================================================================
// Constants
// ============================================================================

/** Items per playlistItems.list page (API maximum) */
export const FEED_PAGE_SIZE = 50;

const DEFAULTS = {
  timeoutMs: 10000,
  baseUrl: 'https://www.googleapis.com/youtube/v3',
} as const;

/** Quota costs per operation */
const QUOTA_COSTS = {
  channels: 1,
  playlistItems: 1,
} as const;

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * YouTubeClient provides access to a channel's uploads feed.
 *
 * @example
 * ```typescript
 * const client = new YouTubeClient({ apiKey });
 * const uploads = await client.getUploadsPlaylistId('UC...');
 * const page = await client.listPlaylistItems(uploads);
 * console.log(`Quota used: ${client.getQuotaUsage().totalUnits} units`);
 * ```
 */
export class YouTubeClient implements VideoFeedService {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private quotaUsage: QuotaUsage = {
    totalUnits: 0,
    channelCalls: 0,
    playlistCalls: 0,
  };

  constructor(options: YouTubeClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULTS.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Resolve the uploads playlist of a channel.
   *
   * @throws YouTubeApiError (404) if the channel does not exist
   */
  async getUploadsPlaylistId(channelId: string): Promise<string> {
    const params = new URLSearchParams({
      part: 'contentDetails',
      id: channelId,
      key: this.apiKey,
    });

    const data = await this.get<YouTubeChannelsResponse>('channels', params);

    this.quotaUsage.channelCalls++;
    this.quotaUsage.totalUnits += QUOTA_COSTS.channels;

    const uploads = data.items?.[0]?.contentDetails?.relatedPlaylists?.uploads;
    if (!uploads) {
      throw new YouTubeApiError(`Channel not found or has no uploads: ${channelId}`, 404);
    }
    return uploads;
  }

  /**
   * Fetch one page of playlist items.
   *
   * Items without a video id (deleted or private uploads) are dropped.
   */
  async listPlaylistItems(playlistId: string, pageToken?: string): Promise<FeedPage> {
    const params = new URLSearchParams({
      part: 'snippet,contentDetails',
      playlistId,
      maxResults: String(FEED_PAGE_SIZE),
      key: this.apiKey,
    });
    if (pageToken) {
      params.set('pageToken', pageToken);
    }

    const data = await this.get<YouTubePlaylistItemsResponse>('playlistItems', params);

    this.quotaUsage.playlistCalls++;
    this.quotaUsage.totalUnits += QUOTA_COSTS.playlistItems;

    return parsePlaylistItemsResponse(data);
  }

  /**
   * Get current quota usage.
   */
  getQuotaUsage(): QuotaUsage {
    return { ...this.quotaUsage };
  }

  /**
   * Reset quota usage tracking.
   * Called at the start of a new run.
   */
  resetQuotaUsage(): void {
    this.quotaUsage = {
      totalUnits: 0,
      channelCalls: 0,
      playlistCalls: 0,
    };
  }

  private async get<T>(resource: string, params: URLSearchParams): Promise<T> {
    const response = await this.fetchWithTimeout(`${this.baseUrl}/${resource}?${params.toString()}`);

    if (!response.ok) {
      await this.handleError(response);
    }

    return (await response.json()) as T;
  }

  /**
   * Execute fetch with timeout using AbortController.
   */
  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchImpl(url, { method: 'GET', signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new YouTubeApiError(`Request timed out after ${this.timeoutMs}ms`, 408);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Handle API error responses.
   *
   * Detects quota exceeded (403) errors and marks them appropriately.
   */
  private async handleError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    let errorMessage = text;
    let isQuotaExceeded = false;

    try {
      const parsed = JSON.parse(text) as {
        error?: {
          message?: string;
          errors?: Array<{ reason?: string }>;
        };
      };
      if (parsed.error?.message) {
        errorMessage = parsed.error.message;
      }
      const reasons = parsed.error?.errors?.map((e) => e.reason) ?? [];
      isQuotaExceeded = reasons.some(
        (r) => r === 'quotaExceeded' || r === 'dailyLimitExceeded'
      );
    } catch {
      // Keep raw text as error message
    }

    let message: string;
    if (isQuotaExceeded) {
      message = `YouTube API quota exceeded: ${errorMessage}`;
    } else if (response.status === 429) {
      message = `Rate limit exceeded: ${errorMessage}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${errorMessage}`;
    } else if (response.status === 400 || response.status === 401) {
      message = `Request rejected (${response.status}): ${errorMessage}`;
    } else if (response.status === 403) {
      message = `Access forbidden: ${errorMessage}`;
    } else {
      message = `API error (${response.status}): ${errorMessage}`;
    }

    throw new YouTubeApiError(message, response.status, isQuotaExceeded);
  }
}

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * Parse a playlistItems.list response into a feed page.
 *
 * Prefers the video's own publish time over the time it was added
 * to the playlist.
 */
export function parsePlaylistItemsResponse(data: YouTubePlaylistItemsResponse): FeedPage {
  const items: FeedItem[] = [];

  for (const item of data.items ?? []) {
    const videoId = item.contentDetails?.videoId ?? item.snippet?.resourceId?.videoId;
    const publishedAt = item.contentDetails?.videoPublishedAt ?? item.snippet?.publishedAt;
    if (!videoId || !publishedAt) {
      continue;
    }
    items.push({
      videoId,
      publishedAt,
      title: item.snippet?.title ?? '',
    });
  }

  return data.nextPageToken ? { items, nextPageToken: data.nextPageToken } : { items };
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error indicates quota exceeded
 */
export function isQuotaExceededError(error: unknown): boolean {
  if (error instanceof YouTubeApiError) {
    return error.isQuotaExceeded;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return message.includes('quota') || message.includes('daily limit');
  }
  return false;
}
