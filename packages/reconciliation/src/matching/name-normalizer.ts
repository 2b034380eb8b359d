/**
 * Name Normalizer
 *
 * Comparison strings for test point titles and result records.
 */

import type { TestResultRecord } from '@testsync/core';

const TEST_PREFIX = 'test_';

/**
 * Lower-case a point title and turn `_` and `-` into spaces
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/[_-]/g, ' ');
}

/**
 * Remove one leading `test_`. Case is preserved.
 */
export function cleanTestName(name: string): string {
  return name.startsWith(TEST_PREFIX) ? name.slice(TEST_PREFIX.length) : name;
}

/**
 * `classname.name`, or just `name` without a classname
 */
export function fullTestName(classname: string, name: string): string {
  return classname ? `${classname}.${name}` : name;
}

export function comparisonKeys(record: TestResultRecord): { cleanName: string; fullName: string } {
  return { cleanName: record.cleanName, fullName: record.fullName };
}
