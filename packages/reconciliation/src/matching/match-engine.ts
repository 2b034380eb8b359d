/**
 * Match Engine
 *
 * Pairs each test point with the result whose name scores highest under
 * any strategy. Points are matched independently; a result may explain
 * several points.
 */

import {
  InvalidOptionsError,
  type TestPointRecord,
  type TestResultRecord,
} from '@testsync/core';
import { extractBest } from '@testsync/similarity';
import {
  DEFAULT_MATCH_STRATEGIES,
  DEFAULT_MIN_SCORE,
  MATCH_STRATEGIES,
  type MatchCandidate,
  type MatchOptions,
  type MatchReport,
  type MatchStrategyName,
} from '../types/index.js';
import { normalizeTitle } from './name-normalizer.js';
import { resolveStrategies, type MatchStrategy } from './strategies.js';

interface ResolvedMatchOptions {
  minScore: number;
  strategies: MatchStrategy[];
}

function isStrategyName(value: string): value is MatchStrategyName {
  return MATCH_STRATEGIES.some((name) => name === value);
}

/**
 * Validate match options and fill in defaults
 *
 * @throws InvalidOptionsError for a threshold outside 0-100 or an unknown strategy
 */
export function resolveMatchOptions(options: MatchOptions = {}): ResolvedMatchOptions {
  const minScore = options.minScore ?? DEFAULT_MIN_SCORE;
  if (!Number.isInteger(minScore) || minScore < 0 || minScore > 100) {
    throw new InvalidOptionsError({
      message: `minScore must be an integer between 0 and 100, got ${minScore}`,
      suggestion: 'Pass --min-score with a whole number from 0 to 100.',
    });
  }

  const names = options.strategies ?? DEFAULT_MATCH_STRATEGIES;
  if (names.length === 0) {
    throw new InvalidOptionsError({ message: 'At least one matching strategy is required' });
  }
  const unknown = names.filter((name) => !isStrategyName(name));
  if (unknown.length > 0) {
    throw new InvalidOptionsError({
      message: `Unknown matching strategies: ${unknown.join(', ')}`,
      suggestion: `Use one of: ${MATCH_STRATEGIES.join(', ')}`,
    });
  }

  return { minScore, strategies: resolveStrategies(names) };
}

function scoreOnePoint(
  point: TestPointRecord,
  results: readonly TestResultRecord[],
  { minScore, strategies }: ResolvedMatchOptions
): MatchCandidate | null {
  const title = normalizeTitle(point.displayTitle);

  let best: { strategy: MatchStrategy; record: TestResultRecord; score: number } | null = null;
  for (const strategy of strategies) {
    const pick = extractBest(title, results, strategy.candidate, strategy.algorithm);
    // Strictly greater: on equal scores the earlier strategy keeps its pick
    if (pick && pick.score > (best?.score ?? 0)) {
      best = { strategy, record: pick.choice, score: pick.score };
    }
  }

  if (!best || best.score < minScore) return null;

  const { key } = best.strategy;
  const matchedKey = best.record[key];
  const result = results.find((record) => record[key] === matchedKey);
  if (!result) return null;

  return {
    point,
    result,
    score: best.score,
    strategy: best.strategy.name,
    pointName: point.displayTitle,
    resultName: result.name,
    matchedKey,
  };
}

/**
 * Best match of one point, or null when nothing reaches the threshold
 */
export function matchOnePoint(
  point: TestPointRecord,
  results: readonly TestResultRecord[],
  options: MatchOptions = {}
): MatchCandidate | null {
  return scoreOnePoint(point, results, resolveMatchOptions(options));
}

/**
 * Match every point against the flattened result set
 */
export function matchTestPoints(
  results: readonly TestResultRecord[],
  points: readonly TestPointRecord[],
  options: MatchOptions = {}
): MatchReport {
  const resolved = resolveMatchOptions(options);
  const matches: MatchCandidate[] = [];
  const unmatchedPoints: TestPointRecord[] = [];

  for (const point of points) {
    const match = scoreOnePoint(point, results, resolved);
    if (match) {
      matches.push(match);
    } else {
      unmatchedPoints.push(point);
    }
  }

  const claimed = new Set(matches.map((match) => match.result.name));
  const unmatchedResults = results.filter((record) => !claimed.has(record.name));

  return { matches, unmatchedPoints, unmatchedResults };
}
