/**
 * Azure DevOps Test Point Store
 *
 * Implements ITestPointStore against the Azure DevOps REST API.
 */

import type { ZodError } from 'zod';
import {
  RemoteError,
  errorMessage,
  listResponseSchema,
  rawTestPointSchema,
  rawTestSuiteSchema,
  rawWorkItemSchema,
  silentLogger,
  type ILogger,
  type ITestPointStore,
  type RawTestPoint,
  type RawTestSuite,
  type RawWorkItem,
  type TestCaseDetails,
  type TestOutcome,
} from '@testsync/core';
import { AzureDevOpsClient, type AzureDevOpsClientConfig } from './client.js';
import { parseTestSteps } from './steps.js';

export type AzureTestPointStoreConfig = AzureDevOpsClientConfig;

const suiteListSchema = listResponseSchema(rawTestSuiteSchema);
const pointListSchema = listResponseSchema(rawTestPointSchema);

/**
 * Re-label a failure with the operation it interrupted.
 * HTTP answers read "HTTP Error <action>: ...", anything else "Error <action>: ...".
 */
function describeFailure(err: unknown, action: string): RemoteError {
  if (err instanceof RemoteError) {
    const prefix = err.status !== undefined ? `HTTP Error ${action}` : `Error ${action}`;
    return new RemoteError({
      code: err.code,
      status: err.status,
      message: `${prefix}: ${err.message}`,
      suggestion: err.suggestion,
      context: err.context,
      cause: err,
    });
  }

  return new RemoteError({
    message: `Error ${action}: ${errorMessage(err)}`,
    cause: err instanceof Error ? err : undefined,
  });
}

function invalidPayload(action: string, error: ZodError): RemoteError {
  const issues = error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
  return new RemoteError({
    message: `Error ${action}: unexpected response shape (${issues})`,
  });
}

function fieldString(fields: Record<string, unknown>, key: string): string | undefined {
  const value = fields[key];
  return typeof value === 'string' ? value : undefined;
}

function identityName(fields: Record<string, unknown>, key: string): string | undefined {
  const value = fields[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && 'displayName' in value) {
    return typeof value.displayName === 'string' ? value.displayName : undefined;
  }
  return undefined;
}

/**
 * Map a work item payload to test case details
 */
export function toTestCaseDetails(workItem: RawWorkItem): TestCaseDetails {
  const fields = workItem.fields;
  const priority = fields['Microsoft.VSTS.Common.Priority'];

  return {
    id: workItem.id,
    title: fieldString(fields, 'System.Title') ?? 'Unknown',
    state: fieldString(fields, 'System.State') ?? 'Unknown',
    assignedTo: identityName(fields, 'System.AssignedTo') ?? 'Unassigned',
    createdBy: identityName(fields, 'System.CreatedBy') ?? 'Unknown',
    createdDate: fieldString(fields, 'System.CreatedDate'),
    priority: typeof priority === 'number' || typeof priority === 'string' ? priority : 'Unknown',
    automationStatus:
      fieldString(fields, 'Microsoft.VSTS.TCM.AutomationStatus') ?? 'Not Automated',
    steps: parseTestSteps(fieldString(fields, 'Microsoft.VSTS.TCM.Steps')),
    url: workItem._links?.html?.href,
  };
}

export class AzureTestPointStore implements ITestPointStore {
  private readonly client: AzureDevOpsClient;
  private readonly logger: ILogger;

  constructor(config: AzureTestPointStoreConfig) {
    this.client = new AzureDevOpsClient(config);
    this.logger = config.logger ?? silentLogger;
  }

  async fetchSuites(planId: number): Promise<RawTestSuite[]> {
    const action = 'fetching test suites';
    let body: unknown;
    try {
      body = await this.client.get(`testplan/Plans/${planId}/suites`);
    } catch (err) {
      throw describeFailure(err, action);
    }

    const parsed = suiteListSchema.safeParse(body ?? {});
    if (!parsed.success) throw invalidPayload(action, parsed.error);
    return parsed.data.value;
  }

  async fetchPoints(planId: number, suiteId: number): Promise<RawTestPoint[]> {
    const action = `fetching test points for suite ${suiteId}`;
    let body: unknown;
    try {
      body = await this.client.get(`test/Plans/${planId}/Suites/${suiteId}/points`);
    } catch (err) {
      throw describeFailure(err, action);
    }

    const parsed = pointListSchema.safeParse(body ?? {});
    if (!parsed.success) throw invalidPayload(action, parsed.error);
    return parsed.data.value;
  }

  async updateOutcome(
    planId: number,
    suiteId: number,
    pointId: number,
    outcome: TestOutcome,
    comment?: string
  ): Promise<RawTestPoint> {
    const action = `updating point ${pointId}`;
    const payload: { outcome: TestOutcome; comment?: string } = { outcome };
    if (comment) {
      payload.comment = comment;
    }

    let body: unknown;
    try {
      body = await this.client.patch(
        `test/Plans/${planId}/Suites/${suiteId}/points/${pointId}`,
        payload
      );
    } catch (err) {
      throw describeFailure(err, action);
    }

    // The endpoint answers with either the point or a `{ value: [point] }` envelope
    const single = rawTestPointSchema.safeParse(body);
    if (single.success) return single.data;

    const list = pointListSchema.safeParse(body ?? {});
    if (!list.success) throw invalidPayload(action, list.error);
    const [first] = list.data.value;
    if (!first) {
      throw new RemoteError({ message: `Error ${action}: empty response` });
    }
    return first;
  }

  /**
   * Never throws: a failed lookup yields placeholder details.
   */
  async fetchTestCaseDetails(testCaseId: number | string): Promise<TestCaseDetails> {
    try {
      const body = await this.client.get(`wit/workitems/${testCaseId}`, { $expand: 'all' });
      return toTestCaseDetails(rawWorkItemSchema.parse(body));
    } catch (err) {
      this.logger.warn('Could not fetch test case details', {
        testCaseId,
        error: errorMessage(err),
      });
      return {
        id: testCaseId,
        title: 'Unable to fetch details',
        state: 'Unknown',
        steps: [],
      };
    }
  }
}
