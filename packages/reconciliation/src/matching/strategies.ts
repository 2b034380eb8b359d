/**
 * Matching strategies, evaluated in list order.
 * Adding a strategy means adding one descriptor here.
 */

import type { TestResultRecord } from '@testsync/core';
import type { SimilarityAlgorithm } from '@testsync/similarity';
import type { MatchStrategyName } from '../types/index.js';

export interface MatchStrategy {
  readonly name: MatchStrategyName;
  /** Result field the pick is resolved back through */
  readonly key: 'cleanName' | 'fullName';
  readonly algorithm: SimilarityAlgorithm;
  /** String the normalized title is scored against */
  readonly candidate: (record: TestResultRecord) => string;
}

export const MATCH_STRATEGY_TABLE: Readonly<Record<MatchStrategyName, MatchStrategy>> = {
  clean_name: {
    name: 'clean_name',
    key: 'cleanName',
    algorithm: 'ratio',
    candidate: (record) => record.cleanName,
  },
  full_name: {
    name: 'full_name',
    key: 'fullName',
    algorithm: 'partial_ratio',
    candidate: (record) => record.fullName,
  },
  token_sort: {
    name: 'token_sort',
    key: 'cleanName',
    algorithm: 'token_sort_ratio',
    candidate: (record) => record.cleanName.toLowerCase(),
  },
  edit_distance: {
    name: 'edit_distance',
    key: 'cleanName',
    algorithm: 'edit_distance',
    candidate: (record) => record.cleanName.toLowerCase(),
  },
};

export function resolveStrategies(names: readonly MatchStrategyName[]): MatchStrategy[] {
  return names.map((name) => MATCH_STRATEGY_TABLE[name]);
}
