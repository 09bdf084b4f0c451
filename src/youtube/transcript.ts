/**
 * YouTube Transcript Retrieval
 *
 * Fetches a timed-caption transcript per video through a
 * {@link TranscriptFetcher}. Videos without a transcript are skipped;
 * the run continues.
 *
 * @module youtube/transcript
 */

import { silentLogger, type Logger } from '../logging/index.js';
import {
  collectOk,
  describeError,
  failed,
  ok,
  skipped,
  type ItemOutcome,
} from '../pipeline/types.js';
import type { Transcript, TranscriptSegment, VideoRef } from '../schemas/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Source of caption segments for a video.
 */
export interface TranscriptFetcher {
  fetchSegments(videoId: string): Promise<TranscriptSegment[]>;
}

/**
 * Error thrown when transcript fetching fails
 */
export class TranscriptError extends Error {
  constructor(
    message: string,
    public readonly videoId: string,
    public readonly isTranscriptUnavailable: boolean = false
  ) {
    super(message);
    this.name = 'TranscriptError';
  }
}

export interface TranscriptRetrievalResult {
  /** Successful transcripts, in input order */
  transcripts: Transcript[];
  /** One outcome per input video */
  outcomes: ItemOutcome<Transcript>[];
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * Fetch transcripts for a list of videos, one at a time.
 *
 * Any failure is logged and the video is omitted from `transcripts`.
 * Unavailable or empty transcripts are reported 'skipped'; other
 * errors (network, timeout) are reported 'failed'.
 */
export async function retrieveTranscripts(
  videos: VideoRef[],
  deps: { fetcher: TranscriptFetcher; logger?: Logger }
): Promise<TranscriptRetrievalResult> {
  const logger = deps.logger ?? silentLogger;
  const outcomes: ItemOutcome<Transcript>[] = [];

  for (const video of videos) {
    try {
      const segments = await deps.fetcher.fetchSegments(video.videoId);

      if (combineSegments(segments) === '') {
        logger.warn(`Transcript for ${video.videoId} is empty, skipping`);
        outcomes.push(skipped(video.videoId, 'Transcript is empty'));
        continue;
      }

      logger.debug(
        `Fetched ${segments.length} caption segment(s) for ${video.videoId} ` +
          `(${Math.round(transcriptDuration(segments))}s)`
      );
      outcomes.push(ok(video.videoId, { videoId: video.videoId, segments }));
    } catch (error) {
      const reason = describeError(error);
      if (isTranscriptUnavailableError(error)) {
        logger.warn(`Transcript unavailable for ${video.videoId}: ${reason}`);
        outcomes.push(skipped(video.videoId, reason));
      } else {
        logger.error(`Transcript fetch failed for ${video.videoId}: ${reason}`);
        outcomes.push(failed(video.videoId, reason));
      }
    }
  }

  return { transcripts: collectOk(outcomes), outcomes };
}

// ============================================================================
// Text Helpers
// ============================================================================

/**
 * Combine transcript segments into coherent text.
 *
 * @param segments - Array of transcript segments
 * @returns Combined, cleaned transcript text
 */
export function combineSegments(segments: TranscriptSegment[]): string {
  const textParts: string[] = [];

  for (const segment of segments) {
    const text = cleanTranscriptText(segment.text);
    if (text) {
      textParts.push(text);
    }
  }

  return textParts.join(' ').replace(/\s+/g, ' ').trim();
}

/**
 * Clean transcript text by removing HTML entities and normalizing.
 */
export function cleanTranscriptText(text: string): string {
  return text
    // Decode common HTML entities
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&#x27;/g, "'")
    .replace(/&nbsp;/g, ' ')
    // Remove any remaining HTML tags
    .replace(/<[^>]*>/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Total spoken duration in seconds (end of the last segment).
 */
export function transcriptDuration(segments: TranscriptSegment[]): number {
  const last = segments[segments.length - 1];
  return last ? last.offset + last.duration : 0;
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Check if an error indicates the transcript is unavailable.
 *
 * Common reasons:
 * - Video has no captions
 * - Captions are disabled by creator
 * - Video is private or deleted
 */
export function isTranscriptUnavailableError(error: unknown): boolean {
  if (error instanceof TranscriptError) {
    return error.isTranscriptUnavailable;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('transcript is disabled') ||
      message.includes('no transcript') ||
      message.includes('transcripts are disabled') ||
      message.includes('video unavailable') ||
      message.includes('is no longer available') ||
      message.includes('private video') ||
      message.includes('not available') ||
      message.includes('disabled for this video')
    );
  }
  return false;
}
