import { describe, expect, it } from 'vitest';
import { parse } from 'csv-parse/sync';
import type { SuitePoints } from '@testsync/core';
import {
  CSV_HEADER,
  describeCriteria,
  formatCompactTimestamp,
  formatCriteriaUpdateSummary,
  formatReconciliationSummary,
  formatTestPointListing,
  formatTestPointsCsv,
  formatTestPointsJson,
  toTestPointRecord,
  type ReconciliationSummary,
} from '../src/index.js';
import { rawPoint } from './in-memory-store.js';

const RULE = '='.repeat(80);
const generatedAt = new Date(2024, 0, 2, 3, 4, 5);

function checkoutSuite(): SuitePoints {
  return {
    suite: { id: 10, name: 'Checkout', type: 'StaticTestSuite' },
    points: [
      toTestPointRecord(rawPoint(11, 'Checkout Flow'), 10),
      toTestPointRecord(rawPoint(12, 'Refund, partial', { outcome: 'Passed', isAutomated: true }), 10),
    ],
  };
}

describe('formatTestPointListing', () => {
  it('renders distributions, points and totals', () => {
    expect(formatTestPointListing([checkoutSuite()], { generatedAt })).toBe(
      [
        RULE,
        'TEST POINTS SUMMARY',
        RULE,
        '',
        'Suite: Checkout (ID: 10)',
        '   Type: StaticTestSuite',
        '   Test Points: 2',
        '   Outcomes: Active: 1, Passed: 1',
        '   States: Ready: 2',
        '   Automated: 1/2',
        '   Test Points:',
        '     1. Point 11: TC-1011 - Checkout Flow',
        '        State: Ready, Outcome: Active, Config: Windows 11',
        '     2. Point 12: TC-1012 - Refund, partial',
        '        State: Ready, Outcome: Passed, Config: Windows 11',
        '',
        RULE,
        'TOTAL SUMMARY',
        RULE,
        'Total Suites: 1',
        'Total Test Points: 2',
        'Generated: 2024-01-02 03:04:05',
      ].join('\n')
    );
  });

  it('shows details and truncates long suites', () => {
    const details = {
      id: '1001',
      title: 'Add to cart',
      state: 'Ready',
      priority: 2,
      automationStatus: 'Automated',
      steps: [{ id: '2', type: 'ActionStep', action: 'Click add', expected: 'Cart shows 1' }],
    };
    const points = [1, 2, 3, 4, 5, 6].map((id) =>
      toTestPointRecord(rawPoint(id, `Case ${id}`), 10, id === 1 ? details : undefined)
    );

    const lines = formatTestPointListing([{ suite: checkoutSuite().suite, points }], {
      detailed: true,
      generatedAt,
    }).split('\n');

    expect(lines).toContain('     1. Point 1: TC-1001 - Add to cart');
    expect(lines).toContain('        Priority: 2, Steps: 1');
    expect(lines).toContain('        Automation: Automated');
    expect(lines).toContain('     ... and 1 more test points');
    expect(lines).not.toContain('     6. Point 6: TC-1006 - Case 6');
  });
});

describe('CSV and JSON output', () => {
  it('writes one quoted row per point under the header', () => {
    const csv = formatTestPointsCsv([checkoutSuite()]);
    const rows: string[][] = parse(csv);

    expect(rows[0]).toEqual([...CSV_HEADER]);
    expect(rows[1]).toEqual([
      '10',
      'Checkout',
      'StaticTestSuite',
      '11',
      '1011',
      'Checkout Flow',
      'Ready',
      'Active',
      'Windows 11',
      'QA Bot',
      'false',
      'N/A',
      '0',
    ]);
    expect(rows[2]?.[5]).toBe('Refund, partial');
    expect(rows[2]?.[10]).toBe('true');
    expect(csv).toContain('"Refund, partial"');
  });

  it('serializes suites as JSON', () => {
    const parsed: unknown = JSON.parse(formatTestPointsJson([checkoutSuite()]));

    expect(parsed).toMatchObject([{ suite: { id: 10, name: 'Checkout' }, points: [{ pointId: 11 }, { pointId: 12 }] }]);
  });

  it('builds file name timestamps', () => {
    expect(formatCompactTimestamp(generatedAt)).toBe('20240102_030405');
  });
});

describe('formatReconciliationSummary', () => {
  const [checkoutPoint, refundPoint] = checkoutSuite().points;
  const result = {
    classname: 'tests.shop',
    name: 'test_checkout_flow',
    fullName: 'tests.shop.test_checkout_flow',
    cleanName: 'checkout_flow',
    duration: 0.3,
    category: 'passed',
  } as const;

  function summary(overrides: Partial<ReconciliationSummary> = {}): ReconciliationSummary {
    if (!checkoutPoint || !refundPoint) throw new Error('fixture points missing');
    return {
      planId: 7,
      totalResults: 1,
      totalPoints: 2,
      totalMatches: 1,
      totalUpdated: 1,
      byOutcome: { Passed: 1 },
      errors: [],
      matches: [
        {
          point: checkoutPoint,
          result,
          score: 92,
          strategy: 'clean_name',
          pointName: 'Checkout Flow',
          resultName: 'test_checkout_flow',
          matchedKey: 'checkout_flow',
          outcome: 'Passed',
          status: 'updated',
        },
      ],
      unmatchedPoints: [refundPoint],
      unmatchedResults: [],
      dryRun: false,
      cancelled: false,
      processingTimeMs: 12,
      ...overrides,
    };
  }

  it('lists matches, unmatched points and counts', () => {
    const lines = formatReconciliationSummary(summary()).split('\n');

    expect(lines.slice(0, 3)).toEqual([RULE, 'RECONCILIATION SUMMARY', RULE]);
    expect(lines).toContain('Suite ID: All suites');
    expect(lines).toContain('Updated: 1/1');
    expect(lines).toContain('By Outcome: Passed: 1');
    expect(lines).toContain(
      '  - Point 11 "Checkout Flow" <- test_checkout_flow [passed -> Passed] (clean_name, 92%, updated)'
    );
    expect(lines).toContain('Unmatched Test Points (1)');
    expect(lines).toContain('  - Point 12: Refund, partial');
    expect(lines.at(-1)).toBe('Processing time: 12ms');
  });

  it('shows planned updates, failures and the no-match state', () => {
    const dryRun = formatReconciliationSummary(summary({ dryRun: true, totalUpdated: 0 })).split('\n');
    expect(dryRun[1]).toBe('DRY RUN - RECONCILIATION SUMMARY');
    expect(dryRun).toContain('Planned Updates: 0');

    const failed = formatReconciliationSummary(
      summary({
        totalUpdated: 0,
        byOutcome: {},
        errors: [{ pointId: 11, suiteId: 10, outcome: 'Passed', message: 'HTTP Error updating point 11: 500' }],
      })
    ).split('\n');
    expect(failed).toContain('By Outcome: none');
    expect(failed).toContain('  - Point 11 (Passed): HTTP Error updating point 11: 500');

    const none = formatReconciliationSummary(
      summary({ totalMatches: 0, totalUpdated: 0, byOutcome: {}, matches: [], noMatches: 'No matches found' })
    ).split('\n');
    expect(none).toContain('No matches found');
    expect(none).toContain('Updated: 0/0');
  });
});

describe('formatCriteriaUpdateSummary', () => {
  it('describes filters', () => {
    expect(describeCriteria(undefined)).toBe('None (all points)');
    expect(describeCriteria({ automated: true, nameContains: 'flow' })).toBe('automated=true, nameContains=flow');
  });

  it('previews eligible points in a dry run', () => {
    const suite = checkoutSuite();
    const lines = formatCriteriaUpdateSummary({
      planId: 7,
      outcome: 'Passed',
      criteria: { automated: true },
      totalFound: 2,
      totalEligible: 1,
      totalUpdated: 0,
      suitesProcessed: 1,
      suites: [{ suite: suite.suite, totalPoints: 2, eligible: suite.points.slice(1) }],
      errors: [],
      dryRun: true,
      cancelled: false,
    }).split('\n');

    expect(lines[1]).toBe('DRY RUN - UPDATING TEST POINTS');
    expect(lines).toContain('Filter Criteria: automated=true');
    expect(lines).toContain('  Eligible points: 1/2');
    expect(lines).toContain('  [DRY RUN] Would update 1 points to Passed');
    expect(lines).toContain('    - Point 12: Refund, partial (Current: Passed)');
    expect(lines).toContain('Eligible for Update: 1');
  });
});
