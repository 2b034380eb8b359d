/**
 * Test Point Lister
 *
 * Fetches the points of a plan, grouped by suite, and flattens the raw
 * API payloads into TestPointRecords.
 */

import {
  silentLogger,
  type ITestPointStore,
  type RawTestPoint,
  type RawTestSuite,
  type SuiteInfo,
  type SuitePoints,
  type TestCaseDetails,
  type TestPointRecord,
} from '@testsync/core';
import type { ListTestPointsOptions } from '../types/index.js';

export function toSuiteInfo(suite: RawTestSuite): SuiteInfo {
  return {
    id: suite.id,
    name: suite.name,
    type: suite.suiteType ?? 'Unknown',
    parentSuiteId: suite.parentSuite?.id,
    planId: suite.plan?.id,
  };
}

/**
 * Flatten a raw point. `suiteId` is the suite it was listed under.
 */
export function toTestPointRecord(
  point: RawTestPoint,
  suiteId: number,
  details?: TestCaseDetails
): TestPointRecord {
  const testCaseName = point.testCase?.name ?? 'Unknown';

  return {
    pointId: point.id,
    testCaseId: point.testCase?.id,
    testCaseName,
    displayTitle: details?.title ?? testCaseName,
    suiteId,
    planId: point.testPlan?.id,
    configurationId: point.configuration?.id,
    configurationName: point.configuration?.name ?? 'Default',
    state: point.state ?? 'Unknown',
    outcome: point.outcome ?? 'Unknown',
    automated: point.isAutomated ?? false,
    assignedTo: point.assignedTo?.displayName ?? 'Unassigned',
    testCaseUrl: point.testCase?.url,
    lastTestRunId: point.lastTestRun?.id,
    lastResultId: point.lastResult?.id,
    details,
  };
}

async function toRecords(
  store: ITestPointStore,
  points: RawTestPoint[],
  suiteId: number,
  detailed: boolean
): Promise<TestPointRecord[]> {
  const records: TestPointRecord[] = [];
  for (const point of points) {
    const testCaseId = point.testCase?.id;
    const details =
      detailed && testCaseId !== undefined && store.fetchTestCaseDetails
        ? await store.fetchTestCaseDetails(testCaseId)
        : undefined;
    records.push(toTestPointRecord(point, suiteId, details));
  }
  return records;
}

/**
 * Points of a plan grouped by suite. Suites without points are left out.
 *
 * With a suite id only that suite is read, named `Suite <id>`.
 */
export async function listTestPoints(
  store: ITestPointStore,
  planId: number,
  options: ListTestPointsOptions = {}
): Promise<SuitePoints[]> {
  const { suiteId, detailed = false } = options;
  const logger = options.logger ?? silentLogger;

  const suites: SuiteInfo[] =
    suiteId !== undefined
      ? [{ id: suiteId, name: `Suite ${suiteId}`, type: 'Unknown' }]
      : (await store.fetchSuites(planId)).map(toSuiteInfo);

  logger.debug('Listing test points', { planId, suites: suites.length, detailed });

  const listing: SuitePoints[] = [];
  for (const suite of suites) {
    const points = await store.fetchPoints(planId, suite.id);
    if (points.length === 0) continue;
    listing.push({ suite, points: await toRecords(store, points, suite.id, detailed) });
  }

  return listing;
}

export function flattenPoints(suites: readonly SuitePoints[]): TestPointRecord[] {
  return suites.flatMap(({ points }) => points);
}
