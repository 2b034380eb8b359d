/**
 * Remote test plan / suite / point types
 */

import type { TestOutcome } from './outcome.js';

/** Identifier as returned by the remote API (numeric or numeric string) */
export type RemoteId = number | string;

/** A single step of a manual test case */
export interface TestStep {
  id: string;
  type: string;
  action: string;
  expected: string;
}

/** Work item details of a test case */
export interface TestCaseDetails {
  id: RemoteId;
  title: string;
  state: string;
  assignedTo?: string;
  createdBy?: string;
  createdDate?: string;
  priority?: string | number;
  automationStatus?: string;
  steps: TestStep[];
  url?: string;
}

/** Test suite metadata */
export interface SuiteInfo {
  id: number;
  name: string;
  type: string;
  parentSuiteId?: RemoteId;
  planId?: RemoteId;
}

/** A remote test point flattened from the API payload */
export interface TestPointRecord {
  pointId: number;
  testCaseId?: RemoteId;
  testCaseName: string;
  /** Title used for matching; the work item title when details were fetched */
  displayTitle: string;
  suiteId: number;
  planId?: RemoteId;
  configurationId?: RemoteId;
  configurationName: string;
  state: string;
  outcome: TestOutcome | string;
  automated: boolean;
  assignedTo: string;
  testCaseUrl?: string;
  lastTestRunId?: RemoteId;
  lastResultId?: RemoteId;
  details?: TestCaseDetails;
}

/** Points grouped under their suite */
export interface SuitePoints {
  suite: SuiteInfo;
  points: TestPointRecord[];
}
