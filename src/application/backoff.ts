import { RetryExhaustedError } from './errors.js';

export interface BackoffPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based):
 * base, 2·base, 4·base, … capped at maxDelayMs.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export interface RetryHooks {
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
  sleep?: Sleep;
}

/**
 * Runs `fn` until it resolves or the attempt budget is spent.
 *
 * @throws RetryExhaustedError wrapping the last failure.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: BackoffPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      lastError = err;
      if (attempt === attempts) break;

      const delayMs = backoffDelay(attempt, policy);
      hooks.onRetry?.(attempt, delayMs, err);
      await wait(delayMs);
    }
  }

  throw new RetryExhaustedError(attempts, lastError);
}
