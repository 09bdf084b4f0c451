/**
 * Recommendation Schemas - model output and ranked tickers
 */

import { z } from 'zod';

/**
 * The JSON object the extraction model is asked to return.
 * Only `recommended_stocks` is read; other fields are ignored.
 */
export const ExtractionResponseSchema = z
  .object({
    recommended_stocks: z.unknown().optional(),
  })
  .passthrough();

export type ExtractionResponse = z.infer<typeof ExtractionResponseSchema>;

/**
 * Ticker with its occurrence count across all transcripts of a run.
 */
export const RankedRecommendationSchema = z.object({
  ticker: z.string().min(1),
  count: z.number().int().positive(),
});

export type RankedRecommendation = z.infer<typeof RankedRecommendationSchema>;
