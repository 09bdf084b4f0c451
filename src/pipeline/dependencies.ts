/**
 * Pipeline Dependencies
 *
 * Builds the real remote clients from an {@link AppConfig}. Kept apart
 * from the runner so that importing the runner does not load the
 * Gemini, transcript or Yahoo Finance SDKs.
 *
 * @module pipeline/dependencies
 */

import { getExtractionModelConfig, requireApiKey, type AppConfig } from '../config/index.js';
import {
  GeminiCompletionModel,
  RECOMMENDATION_SYSTEM_INSTRUCTION,
  RecommendationExtractor,
} from '../extraction/index.js';
import type { Logger } from '../logging/index.js';
import type { PriceLookup } from '../purchasing/index.js';
import { YahooPriceLookup } from '../purchasing/yahoo.js';
import { YouTubeClient } from '../youtube/index.js';
import { createYoutubeTranscriptFetcher } from '../youtube/transcript-fetcher.js';
import type { PipelineDependencies } from './runner.js';

/**
 * Create the YouTube, transcript and Gemini clients for a run.
 *
 * @throws ConfigurationError if YOUTUBE_API_KEY or GOOGLE_AI_API_KEY is missing
 */
export function createPipelineDependencies(config: AppConfig, logger: Logger): PipelineDependencies {
  const youtubeKey = requireApiKey(config, 'youtube');
  const googleAiKey = requireApiKey(config, 'googleAi');

  const modelConfig = getExtractionModelConfig(config.models.extraction);
  const model = new GeminiCompletionModel(googleAiKey, modelConfig, RECOMMENDATION_SYSTEM_INSTRUCTION);

  return {
    feed: new YouTubeClient({ apiKey: youtubeKey }),
    transcripts: createYoutubeTranscriptFetcher(),
    extractor: new RecommendationExtractor(model, {
      maxTranscriptChars: modelConfig.maxTranscriptChars,
      logger,
    }),
    logger,
  };
}

/**
 * Price source for simulated purchases. Needs no API key.
 */
export function createPriceLookup(): PriceLookup {
  return new YahooPriceLookup();
}
