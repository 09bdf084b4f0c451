/**
 * Unit Tests for All Zod Schemas
 *
 * Tests each schema with valid and invalid data to ensure proper validation.
 */

import { describe, it, expect } from '@jest/globals';

import {
  ChannelEntrySchema,
  ExtractionResponseSchema,
  ISO8601TimestampSchema,
  LedgerDateSchema,
  PurchaseRecordSchema,
  RankedRecommendationSchema,
  SENTINEL_PRICE,
  TranscriptSchema,
  VideoRefSchema,
  serializeTranscript,
} from './index.js';

// ============================================================================
// Channels
// ============================================================================

describe('ChannelEntrySchema', () => {
  it('accepts a channel with an integer priority', () => {
    const result = ChannelEntrySchema.safeParse({ name: 'Alpha', channelId: 'UC1', priority: -3 });
    expect(result.success).toBe(true);
  });

  it('rejects a fractional priority', () => {
    const result = ChannelEntrySchema.safeParse({ name: 'Alpha', channelId: 'UC1', priority: 1.5 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Priority must be an integer');
    }
  });

  it('rejects an empty channel id', () => {
    const result = ChannelEntrySchema.safeParse({ name: 'Alpha', channelId: '', priority: 1 });
    expect(result.success).toBe(false);
  });
});

// ============================================================================
// Videos and Transcripts
// ============================================================================

describe('ISO8601TimestampSchema', () => {
  it('accepts UTC and offset timestamps', () => {
    expect(ISO8601TimestampSchema.safeParse('2026-03-09T12:00:00Z').success).toBe(true);
    expect(ISO8601TimestampSchema.safeParse('2026-03-09T12:00:00+05:30').success).toBe(true);
  });

  it('rejects a bare date', () => {
    expect(ISO8601TimestampSchema.safeParse('2026-03-09').success).toBe(false);
  });
});

describe('VideoRefSchema', () => {
  it('accepts a video without a title', () => {
    const result = VideoRefSchema.safeParse({
      videoId: 'v1',
      publishedAt: '2026-03-09T12:00:00Z',
      channelId: 'UC1',
    });
    expect(result.success).toBe(true);
  });
});

describe('TranscriptSchema', () => {
  it('rejects negative offsets', () => {
    const result = TranscriptSchema.safeParse({
      videoId: 'v1',
      segments: [{ text: 'hello', offset: -1, duration: 2 }],
    });
    expect(result.success).toBe(false);
  });

  it('serializes segments as a JSON array', () => {
    expect(
      serializeTranscript({ videoId: 'v1', segments: [{ text: 'buy MU', offset: 1.5, duration: 2 }] })
    ).toBe('[{"text":"buy MU","offset":1.5,"duration":2}]');
  });
});

// ============================================================================
// Recommendations
// ============================================================================

describe('ExtractionResponseSchema', () => {
  it('keeps unknown fields and tolerates a missing list', () => {
    const result = ExtractionResponseSchema.safeParse({ reasoning: 'n/a' });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.recommended_stocks).toBeUndefined();
      expect(result.data).toEqual({ reasoning: 'n/a' });
    }
  });
});

describe('RankedRecommendationSchema', () => {
  it('requires a positive count', () => {
    expect(RankedRecommendationSchema.safeParse({ ticker: 'MU', count: 2 }).success).toBe(true);
    expect(RankedRecommendationSchema.safeParse({ ticker: 'MU', count: 0 }).success).toBe(false);
  });
});

// ============================================================================
// Purchases
// ============================================================================

describe('PurchaseRecordSchema', () => {
  it('accepts the sentinel price', () => {
    const result = PurchaseRecordSchema.safeParse({
      asset: 'MU',
      price: SENTINEL_PRICE,
      quantity: 1000,
      expiration: '2026/03/14',
    });
    expect(result.success).toBe(true);
  });

  it('rejects a zero quantity', () => {
    const result = PurchaseRecordSchema.safeParse({
      asset: 'MU',
      price: 95.25,
      quantity: 0,
      expiration: '2026/03/14',
    });
    expect(result.success).toBe(false);
  });

  it('requires slash-separated dates', () => {
    expect(LedgerDateSchema.safeParse('2026/03/14').success).toBe(true);
    expect(LedgerDateSchema.safeParse('2026-03-14').success).toBe(false);
  });
});
