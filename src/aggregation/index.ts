/**
 * Aggregation Module
 *
 * @module aggregation
 */

export {
  aggregateRecommendations,
  countRecommendations,
  rankRecommendations,
  topTickers,
  type RecommendationSet,
} from './aggregator.js';
