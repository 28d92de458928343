// src/core/retry/backoff.ts
import { cancelled, isArchiveError, retriesExhausted, type ArchiveError } from '../errors.js';
import type { RetryEvent, RetryPolicy } from '../types/index.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Extra attempts allowed after the first one */
  maxRetries: number;
  policy: Readonly<RetryPolicy>;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
  onRetry?: (event: RetryEvent) => void;
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Delay before retry number `retryIndex` (0 for the first retry).
 *
 * Without jitter the result never decreases as `retryIndex` grows.
 */
export function computeBackoffDelay(
  retryIndex: number,
  policy: Readonly<RetryPolicy>,
  random: () => number = Math.random
): number {
  const nominal = policy.baseDelayMs * Math.pow(policy.factor, retryIndex);
  const jittered = nominal * (1 + policy.jitter * random());
  return Math.round(Math.min(policy.maxDelayMs, jittered));
}

function retryAfterHint(error: ArchiveError): number | undefined {
  const hint = error.context?.retryAfterMs;
  return typeof hint === 'number' && Number.isFinite(hint) ? hint : undefined;
}

/**
 * Runs `operation` until it succeeds, fails permanently, or the retry
 * budget is spent.
 *
 * Only retryable `ArchiveError`s are retried. Anything else is rethrown as is.
 * Attempts are strictly sequential and none starts after `signal` aborts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxRetries, policy, signal, onRetry } = options;
  const sleep = options.sleep ?? abortableSleep;
  const random = options.random ?? Math.random;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw cancelled();
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (!isArchiveError(error) || !error.retryable) {
        throw error;
      }
      if (attempt > maxRetries) {
        throw retriesExhausted(attempt, error);
      }

      let delayMs = computeBackoffDelay(attempt - 1, policy, random);
      const hint = retryAfterHint(error);
      if (hint !== undefined) {
        delayMs = Math.min(policy.maxDelayMs, Math.max(delayMs, hint));
      }

      onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, signal);
    }
  }
}
