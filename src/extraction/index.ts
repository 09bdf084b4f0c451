/**
 * Extraction Module
 *
 * @module extraction
 */

export {
  RecommendationExtractor,
  type ExtractionOutcome,
  type ExtractorOptions,
  type ExtractionBatch,
} from './extractor.js';

export {
  GeminiCompletionModel,
  callWithTimeout,
  type CompletionModel,
  type CompletionResult,
  type TokenUsage,
} from './llm-client.js';

export {
  parseRecommendationResponse,
  stripCodeFences,
  findJsonObject,
  type ParseResult,
} from './parser.js';

export {
  RECOMMENDATION_SYSTEM_INSTRUCTION,
  TRUNCATION_MARKER,
  buildRecommendationPrompt,
} from './prompts.js';
