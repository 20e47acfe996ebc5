import { ConcurrencyError, ExternalServiceError, TimeoutError } from './errors.js';

export interface RetryOptions {
  /** Attempts after the first one */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Decides whether a failure is worth another attempt. Defaults to isTransientError. */
  shouldRetry?: (error: unknown) => boolean;
  /** Stops further attempts and cuts a pending backoff short */
  signal?: AbortSignal;
}

/**
 * Failures that may clear up on their own: a collaborator that errored or
 * did not answer in time, or a lost compare-and-set.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof ExternalServiceError || error instanceof TimeoutError || error instanceof ConcurrencyError;
}

/**
 * Delay before retry number `attempt + 1`, doubling from `baseDelayMs` up to `maxDelayMs`
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}

/**
 * Run `operation` until it succeeds, the failure is not retryable, the
 * retries run out or `signal` aborts. The last failure is rethrown as is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 1000, maxDelayMs = 30000, shouldRetry = isTransientError, signal } = options;

  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxRetries || signal?.aborted === true || !shouldRetry(error)) {
        throw error;
      }
      await sleep(backoffDelay(attempt, baseDelayMs, maxDelayMs), signal);
    }
  }
}

/**
 * Sleep for specified milliseconds. Rejects with the abort reason when
 * `signal` aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against a deadline. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

/**
 * Check if value is defined (not null or undefined)
 */
export function isDefined<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}
