/**
 * Azure DevOps Test Management REST Client
 *
 * Thin wrapper over the test plan, test point and work item endpoints.
 * Authenticates with a Personal Access Token over HTTP Basic.
 */

import { RemoteError, silentLogger, type ILogger } from '@testsync/core';
import { withRetries, type RetryConfig } from '../retry.js';

export interface AzureDevOpsClientConfig {
  /** Organization URL, e.g. https://dev.azure.com/my-org */
  organizationUrl: string;
  /** Project name */
  project: string;
  /** Personal Access Token */
  personalAccessToken: string;
  /** REST api-version (default: 7.1) */
  apiVersion?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Retry policy for transient failures (default: no retries) */
  retry?: RetryConfig;
  /** Cuts a retry backoff short; the last error is rethrown */
  signal?: AbortSignal;
  logger?: ILogger;
}

type HttpMethod = 'GET' | 'PATCH';

type QueryValue = string | number | undefined;

function readMessage(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('message' in body)) return undefined;
  return typeof body.message === 'string' && body.message ? body.message : undefined;
}

export class AzureDevOpsClient {
  private readonly config: AzureDevOpsClientConfig;
  private readonly baseUrl: string;
  private readonly logger: ILogger;

  constructor(config: AzureDevOpsClientConfig) {
    this.config = config;
    const org = config.organizationUrl.replace(/\/+$/, '');
    this.baseUrl = `${org}/${encodeURIComponent(config.project)}/_apis`;
    this.logger = config.logger ?? silentLogger;
  }

  get apiVersion(): string {
    return this.config.apiVersion ?? '7.1';
  }

  /**
   * GET a resource below `_apis`
   */
  async get(path: string, query: Record<string, QueryValue> = {}): Promise<unknown> {
    return this.request('GET', path, query);
  }

  /**
   * PATCH a resource below `_apis` with a JSON body
   */
  async patch(path: string, body: unknown, query: Record<string, QueryValue> = {}): Promise<unknown> {
    return this.request('PATCH', path, query, body);
  }

  buildUrl(path: string, query: Record<string, QueryValue> = {}): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, String(value));
    }
    params.set('api-version', this.apiVersion);
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}?${params.toString()}`;
  }

  private authorizationHeader(): string {
    const credentials = Buffer.from(`:${this.config.personalAccessToken}`).toString('base64');
    return `Basic ${credentials}`;
  }

  private async request(
    method: HttpMethod,
    path: string,
    query: Record<string, QueryValue>,
    body?: unknown
  ): Promise<unknown> {
    const url = this.buildUrl(path, query);

    return withRetries(
      (attempt) => {
        this.logger.debug('Azure DevOps request', { method, url, attempt });
        return this.send(method, url, body);
      },
      this.config.retry,
      {
        signal: this.config.signal,
        onRetry: ({ attempt, attempts, delayMs, error }) => {
          this.logger.warn('Retrying Azure DevOps request', {
            method,
            url,
            attempt,
            attempts,
            delayMs,
            error,
          });
        },
      }
    );
  }

  private async send(method: HttpMethod, url: string, body?: unknown): Promise<unknown> {
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: this.authorizationHeader(),
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new RemoteError({
          code: 'TIMEOUT',
          message: `Request timed out after ${timeoutMs}ms`,
          suggestion: 'Increase the timeout or check network connectivity.',
          context: { method, url },
        });
      }

      throw new RemoteError({
        message: `Failed to connect to Azure DevOps: ${err instanceof Error ? err.message : String(err)}`,
        cause: err instanceof Error ? err : undefined,
        context: { method, url },
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw await this.toRemoteError(response, method, url);
    }

    // Handle 204 No Content
    if (response.status === 204) {
      return undefined;
    }

    try {
      return await response.json();
    } catch (err) {
      throw new RemoteError({
        status: response.status,
        message: 'Response body is not valid JSON',
        cause: err instanceof Error ? err : undefined,
        context: { method, url },
      });
    }
  }

  private async toRemoteError(response: Response, method: HttpMethod, url: string): Promise<RemoteError> {
    let errorMessage = `${response.status} ${response.statusText}`.trim();

    try {
      const errorBody: unknown = await response.json();
      const message = readMessage(errorBody);
      if (message) {
        errorMessage = `${errorMessage}: ${message}`;
      }
    } catch {
      // Non-JSON error bodies keep the status line only
    }

    const context = { method, url };

    if (response.status === 401 || response.status === 403) {
      return new RemoteError({
        code: 'AUTHENTICATION_FAILED',
        status: response.status,
        message: errorMessage,
        suggestion: 'Check that the Personal Access Token is valid and has Test Management scope.',
        context,
      });
    }

    if (response.status === 429) {
      return new RemoteError({
        code: 'RATE_LIMITED',
        status: response.status,
        message: errorMessage,
        suggestion: 'Wait and retry, or configure retry attempts.',
        context,
      });
    }

    return new RemoteError({ status: response.status, message: errorMessage, context });
  }
}
