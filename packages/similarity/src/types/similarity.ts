/**
 * String Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Integer score between 0 (no overlap) and 100 (identical) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm =
  | 'ratio'
  | 'partial_ratio'
  | 'token_sort_ratio'
  | 'edit_distance';
