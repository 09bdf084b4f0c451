/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the schema definitions used in the pipeline.
 */

// ============================================================================
// Channels
// ============================================================================

export { ChannelEntrySchema, type ChannelEntry } from './channel.js';

// ============================================================================
// Videos and Transcripts
// ============================================================================

export {
  ISO8601TimestampSchema,
  VideoRefSchema,
  TranscriptSegmentSchema,
  TranscriptSchema,
  serializeTranscript,
  type VideoRef,
  type TranscriptSegment,
  type Transcript,
} from './video.js';

// ============================================================================
// Recommendations
// ============================================================================

export {
  ExtractionResponseSchema,
  RankedRecommendationSchema,
  type ExtractionResponse,
  type RankedRecommendation,
} from './recommendation.js';

// ============================================================================
// Purchases
// ============================================================================

export {
  SENTINEL_PRICE,
  LedgerDateSchema,
  PurchaseRecordSchema,
  type PurchaseRecord,
} from './purchase.js';
