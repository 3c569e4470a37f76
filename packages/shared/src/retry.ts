/**
 * Bounded Retry Policy
 *
 * Exponential backoff with full jitter, the same schedule BullMQ applies to
 * job attempts, expressed as a value the stages receive instead of ad hoc
 * loops at the call sites.
 */

import { config } from './config';
import { CancelledError, TransientFetchError, isRetryable, throwIfAborted } from './errors';
import { logger } from './logger';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 = deterministic exponential delay, 1 = full jitter */
  jitter: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** Label for log lines */
  operation?: string;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injected for tests */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: config.fetchMaxAttempts,
    baseDelayMs: config.backoffBaseMs,
    maxDelayMs: config.backoffMaxMs,
    jitter: 1,
    isRetryable,
    ...overrides,
  };
}

/**
 * Delay before attempt `attempt + 1`, given that `attempt` (1-based) failed.
 * A server-provided Retry-After wins when it is longer.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  error?: unknown,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jittered = exponential * (1 - policy.jitter) + exponential * policy.jitter * random();
  const retryAfter = error instanceof TransientFetchError ? error.retryAfterMs ?? 0 : 0;
  return Math.round(Math.max(jittered, Math.min(retryAfter, policy.maxDelayMs)));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or the attempt
 * bound is reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof CancelledError || !policy.isRetryable(error) || attempt >= policy.maxAttempts) {
        throw error;
      }

      const delayMs = computeBackoffDelay(policy, attempt, error, random);
      logger.warn('Retrying after failure', {
        operation: options.operation,
        attempt,
        max_attempts: policy.maxAttempts,
        delay_ms: delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, options.signal);
    }
  }
}
