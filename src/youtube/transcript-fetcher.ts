/**
 * youtube-transcript Fetcher
 *
 * {@link TranscriptFetcher} backed by the youtube-transcript npm package.
 *
 * @module youtube/transcript-fetcher
 */

import { YoutubeTranscript } from 'youtube-transcript';
import { describeError } from '../pipeline/types.js';
import type { TranscriptSegment } from '../schemas/index.js';
import {
  TranscriptError,
  isTranscriptUnavailableError,
  type TranscriptFetcher,
} from './transcript.js';

export interface TranscriptFetcherOptions {
  /** Preferred caption language, e.g. 'en' */
  lang?: string;
  /** Timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * Create a fetcher backed by the youtube-transcript package, which reads
 * YouTube's caption data without authentication.
 *
 * @throws TranscriptError, flagged unavailable when captions are missing or disabled
 */
export function createYoutubeTranscriptFetcher(
  options: TranscriptFetcherOptions = {}
): TranscriptFetcher {
  const timeoutMs = options.timeoutMs ?? 10000;

  return {
    async fetchSegments(videoId: string): Promise<TranscriptSegment[]> {
      let timeoutId: NodeJS.Timeout | undefined;
      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TranscriptError(`Transcript fetch timed out after ${timeoutMs}ms`, videoId));
        }, timeoutMs);
      });

      try {
        const rawSegments = await Promise.race([
          YoutubeTranscript.fetchTranscript(videoId, options.lang ? { lang: options.lang } : undefined),
          timeoutPromise,
        ]);

        return rawSegments.map((seg) => ({
          text: seg.text,
          offset: seg.offset,
          duration: seg.duration,
        }));
      } catch (error) {
        if (error instanceof TranscriptError) {
          throw error;
        }
        throw new TranscriptError(describeError(error), videoId, isTranscriptUnavailableError(error));
      } finally {
        clearTimeout(timeoutId);
      }
    },
  };
}
