/**
 * Uploads Feed Paging
 *
 * Lazily pages through a channel's uploads playlist and decides which
 * items fall inside the recency window.
 *
 * Uploads feeds are served newest first, so the first item older than the
 * window start ends the scan: nothing after it can be in the window, and the
 * next page is never requested. If a feed is not strictly time-ordered,
 * older-looking items can hide newer ones behind them; that case is not handled.
 *
 * @module youtube/feed
 */

import type { FeedItem, FeedPage, VideoFeedService } from './client.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Recency Window
// ============================================================================

/**
 * Inclusive time range `[start, end]` of uploads that are new enough.
 */
export interface RecencyWindow {
  start: Date;
  end: Date;
}

/**
 * Window of `windowDays` ending at `now`.
 */
export function recencyWindow(now: Date, windowDays: number): RecencyWindow {
  return {
    start: new Date(now.getTime() - windowDays * DAY_MS),
    end: new Date(now.getTime()),
  };
}

/**
 * Stop predicate: the item was published before the window opened.
 */
export function isBeforeWindow(item: FeedItem, window: RecencyWindow): boolean {
  return Date.parse(item.publishedAt) < window.start.getTime();
}

/**
 * Item was published inside the window, bounds included.
 */
export function isInWindow(item: FeedItem, window: RecencyWindow): boolean {
  const publishedMs = Date.parse(item.publishedAt);
  return publishedMs >= window.start.getTime() && publishedMs <= window.end.getTime();
}

// ============================================================================
// Paging
// ============================================================================

/**
 * Yield pages of a playlist, requesting each page only when the
 * consumer asks for it. Breaking out of the loop stops paging.
 *
 * Each call starts a fresh scan from the newest page.
 */
export async function* iterateFeedPages(
  feed: VideoFeedService,
  playlistId: string
): AsyncGenerator<FeedPage, void, undefined> {
  let pageToken: string | undefined;
  do {
    const page = await feed.listPlaylistItems(playlistId, pageToken);
    yield page;
    pageToken = page.nextPageToken;
  } while (pageToken);
}

/**
 * Result of scanning one feed
 */
export interface FeedScan {
  /** Items inside the window, in feed order */
  items: FeedItem[];
  /** Pages requested */
  pagesFetched: number;
  /** Scan ended on an out-of-window item rather than the end of the feed */
  stoppedEarly: boolean;
  /** Items dated after the window end (scheduled or clock skew) */
  futureItems: number;
  /** Items whose publish time could not be parsed */
  undatedItems: number;
}

/**
 * Collect the in-window items of a playlist, stopping at the first item
 * published before the window.
 */
export async function scanFeed(
  feed: VideoFeedService,
  playlistId: string,
  window: RecencyWindow
): Promise<FeedScan> {
  const scan: FeedScan = {
    items: [],
    pagesFetched: 0,
    stoppedEarly: false,
    futureItems: 0,
    undatedItems: 0,
  };

  for await (const page of iterateFeedPages(feed, playlistId)) {
    scan.pagesFetched++;

    for (const item of page.items) {
      if (Number.isNaN(Date.parse(item.publishedAt))) {
        scan.undatedItems++;
        continue;
      }
      if (isBeforeWindow(item, window)) {
        scan.stoppedEarly = true;
        return scan;
      }
      if (isInWindow(item, window)) {
        scan.items.push(item);
      } else {
        scan.futureItems++;
      }
    }
  }

  return scan;
}
