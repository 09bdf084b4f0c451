/**
 * Video Schemas - uploads selected by discovery and their transcripts
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Must be a valid ISO8601 timestamp' });

// ============================================
// VideoRef Schema
// ============================================

/**
 * A video found in a channel's uploads feed inside the recency window.
 */
export const VideoRefSchema = z.object({
  videoId: z.string().min(1),
  publishedAt: ISO8601TimestampSchema,
  /** Channel the video was discovered under */
  channelId: z.string().min(1),
  title: z.string().optional(),
});

export type VideoRef = z.infer<typeof VideoRefSchema>;

// ============================================
// Transcript Schemas
// ============================================

/**
 * A timed caption segment. Times are in seconds.
 */
export const TranscriptSegmentSchema = z.object({
  text: z.string(),
  offset: z.number().nonnegative(),
  duration: z.number().nonnegative(),
});

export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

export const TranscriptSchema = z.object({
  videoId: z.string().min(1),
  segments: z.array(TranscriptSegmentSchema),
});

export type Transcript = z.infer<typeof TranscriptSchema>;

/**
 * Serialize a transcript's segments as a JSON document.
 * This is the text embedded in the extraction prompt.
 */
export function serializeTranscript(transcript: Transcript): string {
  return JSON.stringify(transcript.segments);
}
