export { MATCH_STRATEGIES, DEFAULT_MATCH_STRATEGIES, DEFAULT_MIN_SCORE } from './reconciliation.js';
export type {
  MatchStrategyName,
  MatchCandidate,
  MatchOptions,
  MatchReport,
  UpdateStatus,
  ReconciledMatch,
  UpdateFailure,
  ReconciliationSummary,
  ReconcileOptions,
  ListTestPointsOptions,
  PointCriteria,
  CriteriaUpdateOptions,
  CriteriaSuiteResult,
  CriteriaUpdateSummary,
} from './reconciliation.js';
