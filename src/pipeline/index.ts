/**
 * Pipeline Module
 *
 * The runner and its shared result types. Real client construction is in
 * `./dependencies.js`, which is not re-exported so that importing the
 * runner stays free of SDK loading.
 *
 * @module pipeline
 */

export {
  runRecommendationPipeline,
  generateRunId,
  type PipelineDependencies,
  type PipelineOptions,
  type PipelineResult,
} from './runner.js';

export {
  ok,
  skipped,
  failed,
  collectOk,
  countOutcomes,
  describeError,
  STAGE_NAMES,
  STAGE_LABELS,
  type ItemOutcome,
  type ItemStatus,
  type StageName,
  type StageTiming,
  type StageObserver,
  type UsageSummary,
} from './types.js';
