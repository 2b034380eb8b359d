/**
 * Test Point Store Interface
 *
 * The remote side of a reconciliation run. Implementations own transport,
 * authentication and any retry policy.
 */

import type { TestCaseDetails, TestOutcome } from '../types/index.js';
import type { RawTestPoint, RawTestSuite } from '../validation/index.js';

export interface ITestPointStore {
  /**
   * List the suites of a test plan
   * @throws RemoteError on transport or HTTP failure
   */
  fetchSuites(planId: number): Promise<RawTestSuite[]>;

  /**
   * List the test points of one suite
   * @throws RemoteError on transport or HTTP failure
   */
  fetchPoints(planId: number, suiteId: number): Promise<RawTestPoint[]>;

  /**
   * Set the outcome of a single test point
   * @throws RemoteError on transport or HTTP failure
   */
  updateOutcome(
    planId: number,
    suiteId: number,
    pointId: number,
    outcome: TestOutcome,
    comment?: string
  ): Promise<RawTestPoint>;

  /**
   * Fetch work item details of a test case. Optional; stores that cannot
   * provide details leave it out and callers fall back to the point's name.
   */
  fetchTestCaseDetails?(testCaseId: number | string): Promise<TestCaseDetails>;
}
