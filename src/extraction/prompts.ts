/**
 * Extraction Prompts
 *
 * System instruction and prompt template for pulling stock-ticker
 * recommendations out of a creator's video transcript.
 *
 * @module extraction/prompts
 */

import { serializeTranscript, type Transcript } from '../schemas/index.js';

// ============================================================================
// Prompt Templates
// ============================================================================

/**
 * System instruction for the extraction model.
 *
 * Sets a financial-analyst persona and pins the output to a single JSON object.
 */
export const RECOMMENDATION_SYSTEM_INSTRUCTION = `You are a financial analyst reviewing transcripts of investing videos. Your task is to identify the stocks the speaker recommends buying.

Rules:
- Only include stocks the speaker explicitly recommends buying or adding to a position
- Skip stocks that are only mentioned, criticized, or recommended for selling
- Use the stock's ticker symbol as listed on its primary exchange (e.g. AAPL, MU, TSM)
- List each ticker at most once
- If nothing is recommended, return an empty list

Respond with a single JSON object of the form {"recommended_stocks": ["TICKER", ...]} and nothing else.`;

/** Appended when a transcript is cut to fit the prompt budget */
export const TRUNCATION_MARKER = '... [transcript truncated]';

/**
 * Build the extraction prompt for one transcript.
 *
 * The transcript is embedded as its JSON segment document.
 *
 * @param transcript - Transcript to analyse
 * @param maxTranscriptChars - Cut-off for the embedded document
 */
export function buildRecommendationPrompt(
  transcript: Transcript,
  maxTranscriptChars: number
): string {
  const document = serializeTranscript(transcript);
  const embedded =
    document.length > maxTranscriptChars
      ? document.substring(0, maxTranscriptChars) + TRUNCATION_MARKER
      : document;

  return `Below is the transcript of a YouTube video (id ${transcript.videoId}) as a JSON array of timed caption segments.

---
TRANSCRIPT:
${embedded}
---

Which stocks does the speaker recommend buying? Answer with {"recommended_stocks": [...]}.`;
}
