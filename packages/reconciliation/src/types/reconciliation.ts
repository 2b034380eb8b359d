/**
 * Reconciliation Types
 */

import type {
  ILogger,
  SuiteInfo,
  TestOutcome,
  TestPointRecord,
  TestResultRecord,
} from '@testsync/core';

/** Strategy tags, in evaluation order */
export const MATCH_STRATEGIES = ['clean_name', 'full_name', 'token_sort', 'edit_distance'] as const;

export type MatchStrategyName = (typeof MATCH_STRATEGIES)[number];

/** Strategies evaluated when none are configured */
export const DEFAULT_MATCH_STRATEGIES: readonly MatchStrategyName[] = [
  'clean_name',
  'full_name',
  'token_sort',
];

export const DEFAULT_MIN_SCORE = 80;

/**
 * A test point paired with the result that best explains it
 */
export interface MatchCandidate {
  point: TestPointRecord;
  result: TestResultRecord;
  /** 0-100 */
  score: number;
  strategy: MatchStrategyName;
  /** Title of the point as compared */
  pointName: string;
  /** `name` of the matched result */
  resultName: string;
  /** Result key the winning strategy compared against */
  matchedKey: string;
}

export interface MatchOptions {
  /** Integer threshold 0-100 (default: 80) */
  minScore?: number;
  /** Strategies in evaluation order (default: clean_name, full_name, token_sort) */
  strategies?: readonly MatchStrategyName[];
}

export interface MatchReport {
  matches: MatchCandidate[];
  unmatchedPoints: TestPointRecord[];
  /** Results whose name no match claimed */
  unmatchedResults: TestResultRecord[];
}

export type UpdateStatus = 'updated' | 'failed' | 'planned' | 'skipped';

export interface ReconciledMatch extends MatchCandidate {
  outcome: TestOutcome;
  /** `planned` in a dry run, `skipped` when cancelled before the update */
  status: UpdateStatus;
}

export interface UpdateFailure {
  pointId: number;
  suiteId: number;
  outcome: TestOutcome;
  message: string;
}

export interface ReconciliationSummary {
  planId: number;
  suiteId?: number;
  totalResults: number;
  totalPoints: number;
  totalMatches: number;
  totalUpdated: number;
  /** Successful updates per outcome; planned updates in a dry run */
  byOutcome: Partial<Record<TestOutcome, number>>;
  errors: UpdateFailure[];
  matches: ReconciledMatch[];
  unmatchedPoints: TestPointRecord[];
  unmatchedResults: TestResultRecord[];
  dryRun: boolean;
  cancelled: boolean;
  /** Set when no point matched any result */
  noMatches?: string;
  processingTimeMs: number;
}

export interface ReconcileOptions extends MatchOptions {
  planId: number;
  /** Path of the JUnit-style result document */
  resultsPath: string;
  /** Restrict the run to one suite */
  suiteId?: number;
  comment?: string;
  dryRun?: boolean;
  /** Match against work item titles instead of point names */
  detailed?: boolean;
  signal?: AbortSignal;
}

export interface ListTestPointsOptions {
  suiteId?: number;
  detailed?: boolean;
  logger?: ILogger;
}

/** Filters of a bulk update; every given filter must hold */
export interface PointCriteria {
  currentOutcome?: string;
  automated?: boolean;
  state?: string;
  /** Case-insensitive substring of the display title */
  nameContains?: string;
}

export interface CriteriaUpdateOptions {
  suiteId?: number;
  criteria?: PointCriteria;
  dryRun?: boolean;
  comment?: string;
  signal?: AbortSignal;
  logger?: ILogger;
}

export interface CriteriaSuiteResult {
  suite: SuiteInfo;
  totalPoints: number;
  eligible: TestPointRecord[];
}

export interface CriteriaUpdateSummary {
  planId: number;
  suiteId?: number;
  outcome: TestOutcome;
  criteria?: PointCriteria;
  totalFound: number;
  totalEligible: number;
  totalUpdated: number;
  suitesProcessed: number;
  /** Suites with at least one eligible point */
  suites: CriteriaSuiteResult[];
  errors: string[];
  dryRun: boolean;
  cancelled: boolean;
}
