/**
 * Recommendation Extractor
 *
 * Sends each transcript to the completion model once and parses the
 * recommended tickers from the reply. There is no retry: a failed call
 * or an unreadable reply yields an empty list for that transcript and
 * the run continues.
 *
 * @module extraction/extractor
 */

import { silentLogger, type Logger } from '../logging/index.js';
import { describeError } from '../pipeline/types.js';
import type { Transcript } from '../schemas/index.js';
import type { CompletionModel, TokenUsage } from './llm-client.js';
import { parseRecommendationResponse } from './parser.js';
import { buildRecommendationPrompt } from './prompts.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of extracting one transcript. `tickers` is empty unless status is 'ok'.
 */
export type ExtractionOutcome =
  | { status: 'ok'; videoId: string; tickers: string[]; tokenUsage: TokenUsage }
  | {
      status: 'parse_failed';
      videoId: string;
      tickers: string[];
      tokenUsage: TokenUsage;
      reason: string;
      /** Model reply as received */
      raw: string;
    }
  | { status: 'failed'; videoId: string; tickers: string[]; reason: string };

export interface ExtractorOptions {
  /** Cut-off for the transcript document in the prompt (default: 60000) */
  maxTranscriptChars?: number;
  logger?: Logger;
}

/**
 * Results for a batch of transcripts, in transcript order
 */
export interface ExtractionBatch {
  outcomes: ExtractionOutcome[];
  /** One list per transcript, empty for failures */
  tickerLists: string[][];
  tokenUsage: TokenUsage;
}

// ============================================================================
// Extractor
// ============================================================================

export class RecommendationExtractor {
  private readonly maxTranscriptChars: number;
  private readonly logger: Logger;

  constructor(
    private readonly model: CompletionModel,
    options: ExtractorOptions = {}
  ) {
    this.maxTranscriptChars = options.maxTranscriptChars ?? 60000;
    this.logger = options.logger ?? silentLogger;
  }

  get modelId(): string {
    return this.model.modelId;
  }

  /**
   * Extract recommended tickers from one transcript.
   */
  async extract(transcript: Transcript): Promise<ExtractionOutcome> {
    const { videoId } = transcript;
    const prompt = buildRecommendationPrompt(transcript, this.maxTranscriptChars);

    let text: string;
    let tokenUsage: TokenUsage;
    try {
      ({ text, tokenUsage } = await this.model.complete(prompt));
    } catch (error) {
      const reason = describeError(error);
      this.logger.error(`Extraction failed for ${videoId}: ${reason}`);
      return { status: 'failed', videoId, tickers: [], reason };
    }

    const parsed = parseRecommendationResponse(text);
    if (!parsed.ok) {
      this.logger.warn(
        `Could not parse recommendations for ${videoId} (${parsed.reason}). Raw response: ${text}`
      );
      return { status: 'parse_failed', videoId, tickers: [], tokenUsage, reason: parsed.reason, raw: text };
    }

    this.logger.debug(`${videoId}: ${parsed.tickers.length} ticker(s) [${parsed.tickers.join(', ')}]`);
    return { status: 'ok', videoId, tickers: parsed.tickers, tokenUsage };
  }

  /**
   * Extract every transcript sequentially, in order.
   */
  async extractAll(transcripts: Transcript[]): Promise<ExtractionBatch> {
    const outcomes: ExtractionOutcome[] = [];
    const tokenUsage: TokenUsage = { input: 0, output: 0 };

    for (const transcript of transcripts) {
      const outcome = await this.extract(transcript);
      outcomes.push(outcome);
      if (outcome.status !== 'failed') {
        tokenUsage.input += outcome.tokenUsage.input;
        tokenUsage.output += outcome.tokenUsage.output;
      }
    }

    return {
      outcomes,
      tickerLists: outcomes.map((outcome) => outcome.tickers),
      tokenUsage,
    };
  }
}
