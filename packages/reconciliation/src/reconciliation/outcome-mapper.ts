import type { TestOutcome } from '@testsync/core';

const CATEGORY_OUTCOMES: ReadonlyMap<string, TestOutcome> = new Map<string, TestOutcome>([
  ['failed', 'Failed'],
  ['error', 'Failed'],
  ['skipped', 'Blocked'],
  ['passed', 'Passed'],
]);

/**
 * Remote outcome for a result category; unknown categories map to `None`
 */
export function mapCategoryToOutcome(category: string): TestOutcome {
  return CATEGORY_OUTCOMES.get(category) ?? 'None';
}
