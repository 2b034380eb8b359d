/**
 * String Similarity Functions
 *
 * Scorers on a 0-100 integer scale. `ratio` is the indel-based ratio
 * 2 * LCS / (|a| + |b|), so one substitution costs as much as a deletion
 * plus an insertion. Any comparison involving an empty string scores 0.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type { SimilarityResult, SimilarityAlgorithm } from '../types/similarity.js';

/**
 * Length of the longest common subsequence
 */
export function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  // Single rolling row over the shorter string
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  const row = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i++) {
    let diagonal = 0;
    for (let j = 1; j <= inner.length; j++) {
      const above = row[j] ?? 0;
      if (outer[i - 1] === inner[j - 1]) {
        row[j] = diagonal + 1;
      } else {
        row[j] = Math.max(above, row[j - 1] ?? 0);
      }
      diagonal = above;
    }
  }

  return row[inner.length] ?? 0;
}

/**
 * Round to the nearest integer, ties to even
 */
export function roundScore(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function indelRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 0;
  return (2 * longestCommonSubsequence(a, b)) / total;
}

/**
 * Character-overlap ratio of two whole strings
 */
export function ratio(a: string, b: string): SimilarityResult {
  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'ratio' };
  }
  if (a === b) {
    return { score: 100, algorithm: 'ratio' };
  }

  const lcs = longestCommonSubsequence(a, b);
  return {
    score: roundScore((200 * lcs) / (a.length + b.length)),
    algorithm: 'ratio',
    details: `LCS: ${lcs}, Lengths: ${a.length}+${b.length}`,
  };
}

/**
 * Best ratio of the shorter string against every same-length window
 * of the longer one.
 *
 * When both strings have the same length the first argument is treated
 * as the shorter.
 */
export function partialRatio(a: string, b: string): SimilarityResult {
  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'partial_ratio' };
  }

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  let best = 0;
  let bestOffset = 0;

  for (let offset = 0; offset + shorter.length <= longer.length; offset++) {
    const window = longer.slice(offset, offset + shorter.length);
    const r = indelRatio(shorter, window);
    if (r > best) {
      best = r;
      bestOffset = offset;
      if (best === 1) break;
    }
  }

  return {
    score: roundScore(best * 100),
    algorithm: 'partial_ratio',
    details: `Window offset: ${bestOffset}, Window length: ${shorter.length}`,
  };
}

/**
 * Lower-case, split on whitespace, sort tokens and rejoin with single spaces
 */
export function sortTokens(value: string): string {
  return value
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .sort()
    .join(' ');
}

/**
 * Ratio of the token-sorted forms, insensitive to word order and case
 */
export function tokenSortRatio(a: string, b: string): SimilarityResult {
  const sortedA = sortTokens(a);
  const sortedB = sortTokens(b);
  const result = ratio(sortedA, sortedB);

  return {
    score: result.score,
    algorithm: 'token_sort_ratio',
    details: `Sorted: "${sortedA}" / "${sortedB}"`,
  };
}

/**
 * Normalized Levenshtein similarity, 100 * (1 - distance / max length)
 */
export function editDistanceRatio(a: string, b: string): SimilarityResult {
  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'edit_distance' };
  }
  if (a === b) {
    return { score: 100, algorithm: 'edit_distance' };
  }

  const dist = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);

  return {
    score: roundScore(100 * (1 - dist / maxLen)),
    algorithm: 'edit_distance',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Calculate similarity using specified algorithm
 */
export function calculateSimilarity(
  a: string,
  b: string,
  algorithm: SimilarityAlgorithm
): SimilarityResult {
  switch (algorithm) {
    case 'ratio':
      return ratio(a, b);
    case 'partial_ratio':
      return partialRatio(a, b);
    case 'token_sort_ratio':
      return tokenSortRatio(a, b);
    case 'edit_distance':
      return editDistanceRatio(a, b);
    default: {
      const exhaustive: never = algorithm;
      throw new Error(`Unknown algorithm: ${String(exhaustive)}`);
    }
  }
}

/**
 * Pick the best-scoring choice. Ties keep the earliest choice, and a
 * choice must score above 0 to be picked.
 */
export function extractBest<T>(
  query: string,
  choices: readonly T[],
  key: (choice: T) => string,
  algorithm: SimilarityAlgorithm
): { choice: T; score: number; index: number } | null {
  let best: { choice: T; score: number; index: number } | null = null;

  for (const [index, choice] of choices.entries()) {
    const { score } = calculateSimilarity(query, key(choice), algorithm);
    if (score > (best?.score ?? 0)) {
      best = { choice, score, index };
    }
  }

  return best;
}
