/**
 * Creator Signals
 *
 * Library entry point: channel loading, video discovery, transcript
 * retrieval, ticker extraction, ranking and simulated purchasing.
 *
 * @example
 * ```typescript
 * import {
 *   createConsoleLogger,
 *   createPipelineDependencies,
 *   loadConfig,
 *   runRecommendationPipeline,
 * } from 'creator-signals';
 *
 * const config = loadConfig();
 * const deps = createPipelineDependencies(config, createConsoleLogger());
 * const { topAssets } = await runRecommendationPipeline(config, deps);
 * ```
 *
 * @module creator-signals
 */

export * from './config/index.js';
export * from './logging/index.js';
export * from './schemas/index.js';
export * from './channels/index.js';
export * from './youtube/index.js';
export * from './extraction/index.js';
export * from './aggregation/index.js';
export * from './purchasing/index.js';
export * from './pipeline/index.js';

// Real clients (load the Gemini, transcript and Yahoo Finance SDKs)
export { createPipelineDependencies, createPriceLookup } from './pipeline/dependencies.js';
export { YahooPriceLookup, type YahooPriceLookupOptions } from './purchasing/yahoo.js';
export { createYoutubeTranscriptFetcher, type TranscriptFetcherOptions } from './youtube/transcript-fetcher.js';
