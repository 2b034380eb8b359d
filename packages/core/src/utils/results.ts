import {
  RESULT_CATEGORIES,
  type ResultCategory,
} from '../types/outcome.js';
import type { ParsedTestResults, TestResultRecord } from '../types/test-result.js';

/**
 * All records in category order (passed, failed, skipped, error),
 * document order within each category.
 */
export function flattenResults(results: ParsedTestResults): TestResultRecord[] {
  return RESULT_CATEGORIES.flatMap((category) => [...results[category]]);
}

export function countResults(results: ParsedTestResults): Record<ResultCategory, number> & {
  total: number;
} {
  return {
    passed: results.passed.length,
    failed: results.failed.length,
    skipped: results.skipped.length,
    error: results.error.length,
    total:
      results.passed.length +
      results.failed.length +
      results.skipped.length +
      results.error.length,
  };
}
