import { TimeoutError, isTransient } from './errors.js';

export interface BackoffPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Delay before retrying after failed attempt `attempt` (1-based): base, 2·base, 4·base… capped. */
export function backoffDelay(policy: Pick<BackoffPolicy, 'baseDelayMs' | 'maxDelayMs'>, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}

export interface RetryOptions extends BackoffPolicy {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the attempt
 * ceiling is reached. The last error is rethrown.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransient;
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= options.maxAttempts || !shouldRetry(err)) {
        throw err;
      }
      const delayMs = backoffDelay(options, attempt);
      options.onRetry?.(err, attempt, delayMs);
      await options.sleep(delayMs, options.signal);
    }
  }
}

/** Reject with TimeoutError when `promise` has not settled within `ms`. */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
