import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RemoteError } from '@testsync/core';
import { AzureTestPointStore, withRetries, type AzureTestPointStoreConfig } from '../src/index.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function createStore(
  retryAttempts = 1,
  overrides: Partial<AzureTestPointStoreConfig> = {}
): AzureTestPointStore {
  return new AzureTestPointStore({
    organizationUrl: 'https://dev.azure.com/acme/',
    project: 'Web Shop',
    personalAccessToken: 'test-secret',
    retry: { attempts: retryAttempts, baseDelayMs: 0, jitter: 0 },
    ...overrides,
  });
}

function lastRequest(): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls.at(-1);
  if (!call) throw new Error('fetch was not called');
  const [url, init] = call;
  return { url: String(url), init: init ?? {} };
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('AzureTestPointStore', () => {
  it('lists suites with basic auth and the api version', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ count: 1, value: [{ id: 10, name: 'Checkout', suiteType: 'StaticTestSuite' }] })
    );

    const suites = await createStore().fetchSuites(7);

    expect(suites).toHaveLength(1);
    expect(suites[0]?.name).toBe('Checkout');

    const { url, init } = lastRequest();
    expect(url).toBe('https://dev.azure.com/acme/Web%20Shop/_apis/testplan/Plans/7/suites?api-version=7.1');
    expect(init.method).toBe('GET');
    expect(init.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from(':test-secret').toString('base64')}`,
    });
  });

  it('treats a missing value array as an empty list', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    await expect(createStore().fetchPoints(7, 10)).resolves.toEqual([]);
  });

  it('labels HTTP failures with the operation', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ message: 'Suite missing' }, { status: 404, statusText: 'Not Found' })
    );

    const pending = createStore().fetchPoints(7, 3);

    await expect(pending).rejects.toBeInstanceOf(RemoteError);
    await expect(pending).rejects.toThrow(
      'HTTP Error fetching test points for suite 3: 404 Not Found: Suite missing'
    );
    await expect(pending).rejects.toMatchObject({ status: 404 });
  });

  it('reports authentication failures with a suggestion', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 401, statusText: 'Unauthorized' }));

    await expect(createStore().fetchSuites(7)).rejects.toMatchObject({
      code: 'AUTHENTICATION_FAILED',
      suggestion: 'Check that the Personal Access Token is valid and has Test Management scope.',
    });
  });

  it('labels connection failures without an HTTP prefix', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(createStore().fetchSuites(7)).rejects.toThrow(
      'Error fetching test suites: Failed to connect to Azure DevOps: fetch failed'
    );
  });

  it('patches the outcome and comment of a point', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ count: 1, value: [{ id: 11, outcome: 'Passed' }] }));

    const point = await createStore().updateOutcome(7, 10, 11, 'Passed', 'CI run');

    expect(point.id).toBe(11);
    const { url, init } = lastRequest();
    expect(url).toBe(
      'https://dev.azure.com/acme/Web%20Shop/_apis/test/Plans/7/Suites/10/points/11?api-version=7.1'
    );
    expect(init.method).toBe('PATCH');
    expect(JSON.parse(String(init.body))).toEqual({ outcome: 'Passed', comment: 'CI run' });
  });

  it('omits an empty comment from the update body', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: 11, outcome: 'Failed' }));

    await createStore().updateOutcome(7, 10, 11, 'Failed');

    expect(JSON.parse(String(lastRequest().init.body))).toEqual({ outcome: 'Failed' });
  });

  it('retries server errors when attempts allow', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(jsonResponse({ value: [{ id: 1, name: 'Root' }] }));

    const suites = await createStore(2).fetchSuites(7);

    expect(suites).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('stops retrying once the signal is aborted', async () => {
    const controller = new AbortController();
    fetchMock.mockImplementation(async () => {
      controller.abort();
      return new Response('', { status: 503, statusText: 'Service Unavailable' });
    });
    const store = createStore(3, {
      retry: { attempts: 3, baseDelayMs: 60_000, jitter: 0 },
      signal: controller.signal,
    });

    await expect(store.fetchSuites(7)).rejects.toMatchObject({ status: 503 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not retry client errors', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 400, statusText: 'Bad Request' }));

    await expect(createStore(3).fetchSuites(7)).rejects.toBeInstanceOf(RemoteError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('maps work item fields to test case details', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        id: 201,
        fields: {
          'System.Title': 'Checkout with saved card',
          'System.State': 'Ready',
          'System.AssignedTo': { displayName: 'QA Bot' },
          'Microsoft.VSTS.Common.Priority': 2,
          'Microsoft.VSTS.TCM.Steps':
            '<steps id="0" last="2"><step id="2" type="ActionStep"><parameterizedString isformatted="true">&lt;P&gt;Pay&lt;/P&gt;</parameterizedString><parameterizedString isformatted="true">&lt;P&gt;Receipt&lt;/P&gt;</parameterizedString></step></steps>',
        },
        _links: { html: { href: 'https://dev.azure.com/acme/_workitems/edit/201' } },
      })
    );

    const details = await createStore().fetchTestCaseDetails(201);

    expect(details).toEqual({
      id: 201,
      title: 'Checkout with saved card',
      state: 'Ready',
      assignedTo: 'QA Bot',
      createdBy: 'Unknown',
      createdDate: undefined,
      priority: 2,
      automationStatus: 'Not Automated',
      steps: [{ id: '2', type: 'ActionStep', action: 'Pay', expected: 'Receipt' }],
      url: 'https://dev.azure.com/acme/_workitems/edit/201',
    });
    expect(lastRequest().url).toBe(
      'https://dev.azure.com/acme/Web%20Shop/_apis/wit/workitems/201?%24expand=all&api-version=7.1'
    );
  });

  it('falls back to placeholder details when the lookup fails', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 500, statusText: 'Server Error' }));

    await expect(createStore().fetchTestCaseDetails(201)).resolves.toEqual({
      id: 201,
      title: 'Unable to fetch details',
      state: 'Unknown',
      steps: [],
    });
  });
});

describe('withRetries', () => {
  it('cuts the backoff short when aborted while waiting', async () => {
    const controller = new AbortController();
    const failure = new RemoteError({ message: 'busy', status: 503 });
    const attempt = vi.fn(async () => {
      throw failure;
    });

    const pending = withRetries(attempt, { attempts: 3, baseDelayMs: 60_000, jitter: 0 }, {
      signal: controller.signal,
      onRetry: () => controller.abort(),
    });

    await expect(pending).rejects.toBe(failure);
    expect(attempt).toHaveBeenCalledTimes(1);
  });
});
