/**
 * Tests for the youtube-transcript backed fetcher
 *
 * The youtube-transcript package is mocked, so no request leaves the process.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { createYoutubeTranscriptFetcher } from './transcript-fetcher.js';
import { TranscriptError } from './transcript.js';

interface RawSegment {
  text: string;
  offset: number;
  duration: number;
  lang?: string;
}

const mockFetchTranscript = jest.fn<(videoId: string, config?: { lang?: string }) => Promise<RawSegment[]>>();

jest.mock('youtube-transcript', () => ({
  YoutubeTranscript: {
    fetchTranscript: (videoId: string, config?: { lang?: string }) => mockFetchTranscript(videoId, config),
  },
}));

describe('createYoutubeTranscriptFetcher', () => {
  beforeEach(() => {
    mockFetchTranscript.mockReset();
  });

  it('should map raw segments and pass the preferred language', async () => {
    mockFetchTranscript.mockResolvedValue([{ text: 'buy MU', offset: 0, duration: 2.5, lang: 'en' }]);

    const segments = await createYoutubeTranscriptFetcher({ lang: 'en' }).fetchSegments('v1');

    expect(segments).toEqual([{ text: 'buy MU', offset: 0, duration: 2.5 }]);
    expect(mockFetchTranscript).toHaveBeenCalledWith('v1', { lang: 'en' });
  });

  it('should omit the config when no language is set', async () => {
    mockFetchTranscript.mockResolvedValue([]);

    await createYoutubeTranscriptFetcher().fetchSegments('v2');

    expect(mockFetchTranscript).toHaveBeenCalledWith('v2', undefined);
  });

  it('should flag disabled captions as unavailable', async () => {
    mockFetchTranscript.mockRejectedValue(new Error('Transcript is disabled on this video (v1)'));

    const error = await createYoutubeTranscriptFetcher()
      .fetchSegments('v1')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscriptError);
    expect(error).toMatchObject({
      message: 'Transcript is disabled on this video (v1)',
      videoId: 'v1',
      isTranscriptUnavailable: true,
    });
  });

  it('should treat other errors as failures', async () => {
    mockFetchTranscript.mockRejectedValue(new Error('socket hang up'));

    const error = await createYoutubeTranscriptFetcher()
      .fetchSegments('v1')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscriptError);
    expect(error).toMatchObject({ message: 'socket hang up', isTranscriptUnavailable: false });
  });

  it('should time out into a TranscriptError', async () => {
    mockFetchTranscript.mockReturnValue(new Promise<RawSegment[]>(() => {}));

    const error = await createYoutubeTranscriptFetcher({ timeoutMs: 10 })
      .fetchSegments('v3')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscriptError);
    expect(error).toMatchObject({
      message: 'Transcript fetch timed out after 10ms',
      videoId: 'v3',
      isTranscriptUnavailable: false,
    });
  });
});
