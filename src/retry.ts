/**
 * @fileoverview Retry & Backoff
 *
 * Transient remote failures are retried with exponential backoff and full
 * jitter: the delay before retry `n` (1-based) is a random value in
 * `[0, min(maxDelayMs, baseDelayMs * 2^(n-1))]`. A server-provided
 * `retryAfterMs` overrides the computed delay (still capped).
 *
 * Non-retryable errors and cancellation are rethrown immediately.
 */

import { debugWarn } from './debug';
import { SyncError, toSyncError } from './errors';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60_000
};

export interface RetryHooks {
  /** Random source in [0, 1). Defaults to `Math.random`. */
  random?: () => number;
  /** Sleep implementation. Defaults to an abortable `setTimeout`. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
  label?: string;
}

/**
 * Upper bound of the backoff window before retry number `retry` (1-based).
 */
export function backoffCeiling(retry: number, policy: RetryPolicy): number {
  const exp = policy.baseDelayMs * Math.pow(2, Math.max(0, retry - 1));
  return Math.min(exp, policy.maxDelayMs);
}

export function computeRetryDelay(
  retry: number,
  policy: RetryPolicy,
  error: SyncError | null,
  random: () => number = Math.random
): number {
  if (error?.retryAfterMs != null) {
    return Math.min(error.retryAfterMs, policy.maxDelayMs);
  }
  return Math.floor(random() * backoffCeiling(retry, policy));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SyncError('cancelled'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SyncError('cancelled'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation`, retrying transient failures according to `policy`.
 * Every error that leaves this function is a {@link SyncError}.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    if (hooks.signal?.aborted) throw new SyncError('cancelled');
    try {
      return await operation();
    } catch (e) {
      const error = toSyncError(e);
      if (!error.retryable || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delay = computeRetryDelay(attempt, policy, error, hooks.random);
      debugWarn(
        `[RETRY] ${hooks.label ?? 'operation'} failed (${error.code}), attempt ${attempt}/${policy.maxAttempts}; retrying in ${delay}ms`
      );
      await wait(delay, hooks.signal);
    }
  }
}
