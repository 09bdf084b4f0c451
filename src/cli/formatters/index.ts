/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  StageProgressDisplay,
  formatDuration,
  type StageStatus,
  type StageDisplay,
} from './progress.js';

// Run summary formatters
export {
  formatPurchaseRecords,
  formatRankedTable,
  formatRunSummary,
  toRunReport,
} from './run-summary.js';
