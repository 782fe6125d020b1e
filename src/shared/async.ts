/**
 * Async utilities for timeout and sleep operations
 */

import { CancelledError, TimeoutError } from '../errors';

/**
 * Sleep that resolves early when the signal aborts
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(handle);
      resolve();
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Race an operation against a deadline and, when given, a cancel signal.
 * The timer and the abort listener are released either way.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation = 'operation',
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) throw new CancelledError(operation);

  let rejectDeadline: (error: Error) => void = () => undefined;
  const deadline = new Promise<never>((_, reject) => {
    rejectDeadline = reject;
  });
  const handle = setTimeout(
    () => rejectDeadline(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, timeoutMs, operation)),
    timeoutMs,
  );
  const onAbort = (): void => rejectDeadline(new CancelledError(operation));
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    clearTimeout(handle);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Time source used by polling loops; swapped for a fake in tests
 */
export interface Clock {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
