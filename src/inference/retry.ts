import { abortReason } from './deadline.js';

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  // Per-attempt timeouts; the last one repeats if attempts outnumber entries
  attemptTimeoutsMs: number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffBaseMs: 500,
  backoffMaxMs: 4_000,
  attemptTimeoutsMs: [2_000, 4_000, 6_000]
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export function attemptTimeout(policy: RetryPolicy, attempt: number): number {
  const timeouts = policy.attemptTimeoutsMs.length > 0
    ? policy.attemptTimeoutsMs
    : DEFAULT_RETRY_POLICY.attemptTimeoutsMs;
  return timeouts[Math.min(attempt, timeouts.length - 1)];
}

// Exponential backoff with full jitter
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const ceiling = Math.min(policy.backoffMaxMs, policy.backoffBaseMs * 2 ** attempt);
  return Math.floor(random() * ceiling);
}

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
