/**
 * @testsync/similarity
 *
 * Fuzzy string scorers on a 0-100 scale.
 */

export {
  ratio,
  partialRatio,
  tokenSortRatio,
  editDistanceRatio,
  calculateSimilarity,
  extractBest,
  sortTokens,
  longestCommonSubsequence,
  roundScore,
} from './similarity/string-similarity.js';
export type { SimilarityResult, SimilarityAlgorithm } from './types/similarity.js';
