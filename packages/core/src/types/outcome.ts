/**
 * Outcome and category vocabularies
 */

/** Result categories assigned while parsing a result document */
export const RESULT_CATEGORIES = ['passed', 'failed', 'skipped', 'error'] as const;

export type ResultCategory = (typeof RESULT_CATEGORIES)[number];

/** Outcome values accepted by the remote test point API */
export const TEST_OUTCOMES = [
  'Passed',
  'Failed',
  'Blocked',
  'NotApplicable',
  'Inconclusive',
  'Timeout',
  'Aborted',
  'None',
] as const;

export type TestOutcome = (typeof TEST_OUTCOMES)[number];

export function isTestOutcome(value: string): value is TestOutcome {
  return (TEST_OUTCOMES as readonly string[]).includes(value);
}
