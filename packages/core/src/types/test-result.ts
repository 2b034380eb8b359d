/**
 * Normalized test result types
 */

import type { ResultCategory } from './outcome.js';

/** One parsed test case from a result document */
export interface TestResultRecord {
  /** Dotted class or module path (may be empty) */
  readonly classname: string;
  /** Test case name as written in the document */
  readonly name: string;
  /** `classname.name`, or `name` when classname is empty */
  readonly fullName: string;
  /** Name with a single leading `test_` removed */
  readonly cleanName: string;
  /** Duration in seconds */
  readonly duration: number;
  /** Category resolved during classification */
  readonly category: ResultCategory;
  /** `message` attribute of the failure/error/skipped marker */
  readonly message?: string;
  /** Body text of the failure/error/skipped marker */
  readonly text?: string;
}

/** Parsed result document, one ordered sequence per category */
export interface ParsedTestResults {
  passed: readonly TestResultRecord[];
  failed: readonly TestResultRecord[];
  skipped: readonly TestResultRecord[];
  error: readonly TestResultRecord[];
}
