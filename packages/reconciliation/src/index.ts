/**
 * @testsync/reconciliation
 *
 * Matches JUnit-style test results to remote test points and applies
 * the resulting outcomes.
 */

// Types
export * from './types/index.js';

// Result parsing
export { parseTestResults, parseTestResultsXml, parseDuration } from './results/result-parser.js';

// Matching
export {
  normalizeTitle,
  cleanTestName,
  fullTestName,
  comparisonKeys,
} from './matching/name-normalizer.js';
export { MATCH_STRATEGY_TABLE, resolveStrategies } from './matching/strategies.js';
export type { MatchStrategy } from './matching/strategies.js';
export { matchOnePoint, matchTestPoints, resolveMatchOptions } from './matching/match-engine.js';

// Reconciliation
export { mapCategoryToOutcome } from './reconciliation/outcome-mapper.js';
export { Reconciler, NO_MATCHES_MESSAGE } from './reconciliation/reconciler.js';
export type { ReconcilerOptions } from './reconciliation/reconciler.js';

// Listing and bulk updates
export {
  listTestPoints,
  flattenPoints,
  toTestPointRecord,
  toSuiteInfo,
} from './listing/test-point-lister.js';
export { updateByCriteria, matchesCriteria } from './updates/criteria-updater.js';

// Formatters
export * from './formatters/index.js';
