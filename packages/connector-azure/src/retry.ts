/**
 * Retry with exponential backoff for remote calls.
 */

import { RemoteError } from '@testsync/core';

export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Exponential backoff base delay (default: 200ms). */
  baseDelayMs?: number;
  /** Max backoff delay (default: 5000ms). */
  maxDelayMs?: number;
  /** Random jitter factor between 0 and 1 (default: 0.2). */
  jitter?: number;
};

export type RetryHooks = {
  /** Decides whether a failed attempt may be repeated */
  isRetryable?: (err: unknown) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (info: { attempt: number; attempts: number; delayMs: number; error: unknown }) => void;
  /** Stops waiting and rethrows the last error when aborted */
  signal?: AbortSignal;
};

function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function resolveRetryConfig(cfg: RetryConfig | undefined): Required<RetryConfig> {
  return {
    attempts: Math.max(1, Math.floor(cfg?.attempts ?? 1)),
    baseDelayMs: cfg?.baseDelayMs ?? 200,
    maxDelayMs: cfg?.maxDelayMs ?? 5000,
    jitter: clampNumber(cfg?.jitter ?? 0.2, 0, 1),
  };
}

/**
 * Delay before `attempt` (1-based). The first attempt never waits.
 */
export function computeBackoffDelayMs(cfg: Required<RetryConfig>, attempt: number): number {
  if (attempt <= 1) return 0;
  const raw = cfg.baseDelayMs * 2 ** (attempt - 2);
  const capped = Math.min(cfg.maxDelayMs, raw);
  const jitterFactor = 1 + (Math.random() * 2 - 1) * cfg.jitter; // +/- jitter
  return Math.max(0, Math.round(capped * jitterFactor));
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Timeouts, throttling, 5xx answers and connection failures are worth
 * another attempt; authentication and other 4xx answers are not.
 */
export function isRetryableRemoteError(err: unknown): boolean {
  if (!(err instanceof RemoteError)) return false;
  if (err.code === 'TIMEOUT' || err.code === 'RATE_LIMITED') return true;
  if (err.code === 'AUTHENTICATION_FAILED') return false;
  if (err.status === undefined) return true;
  return err.status >= 500;
}

export async function withRetries<T>(
  fn: (attempt: number) => Promise<T>,
  cfg: RetryConfig | undefined,
  hooks: RetryHooks = {}
): Promise<T> {
  const config = resolveRetryConfig(cfg);
  const isRetryable = hooks.isRetryable ?? isRetryableRemoteError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= config.attempts || !isRetryable(err) || hooks.signal?.aborted) {
        throw err;
      }
      const delayMs = computeBackoffDelayMs(config, attempt + 1);
      hooks.onRetry?.({ attempt, attempts: config.attempts, delayMs, error: err });
      await sleep(delayMs, hooks.signal);
      if (hooks.signal?.aborted) throw err;
    }
  }
}
