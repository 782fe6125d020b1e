/**
 * Readiness Prober
 *
 * Polls a predicate until it reports ready, the deadline passes, or the
 * caller cancels. Pending -> Ready | TimedOut | Cancelled.
 *
 * @example
 * ```typescript
 * const result = await awaitReady((attempt) => gateway.checkReady(target, attempt), {
 *   timeoutMs: 60_000,
 *   pollIntervalMs: 5_000,
 *   signal,
 * });
 * if (!result.ok) logger.warn(result.error, 'Service did not become ready');
 * ```
 */

import { Success, Failure, type Result } from '../domain/types';
import { CancelledError, errorMessage } from '../errors';
import { systemClock, withTimeout, type Clock } from '../shared/async';

/**
 * One readiness check. The signal fires once the poll is abandoned, at the
 * deadline or on cancellation.
 */
export type ReadinessProbe = (signal: AbortSignal) => Promise<boolean>;

export interface ProbeOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
  clock?: Clock;
}

export interface Ready {
  status: 'ready';
  attempts: number;
  elapsedMs: number;
}

export interface NotReady {
  status: 'timed_out' | 'cancelled';
  attempts: number;
  elapsedMs: number;
  /** Message of the last probe that threw, if any */
  lastError?: string;
}

export type ReadinessResult = Result<Ready, NotReady>;

/**
 * Wait for `probe` to resolve true.
 *
 * The first poll happens immediately; later polls follow every
 * `pollIntervalMs`. The final sleep is shortened so the last poll lands on
 * the deadline instead of past it. A probe that throws counts as not ready;
 * one still pending at the deadline or on cancellation is abandoned.
 */
export async function awaitReady(probe: ReadinessProbe, options: ProbeOptions): Promise<ReadinessResult> {
  const { timeoutMs, pollIntervalMs, signal, clock = systemClock } = options;
  if (timeoutMs < 0 || pollIntervalMs <= 0) {
    throw new RangeError('timeoutMs must be >= 0 and pollIntervalMs > 0');
  }

  const start = clock.now();
  let attempts = 0;
  let lastError: string | undefined;

  const notReady = (status: NotReady['status']): ReadinessResult =>
    Failure<Ready, NotReady>({
      status,
      attempts,
      elapsedMs: clock.now() - start,
      ...(lastError !== undefined && { lastError }),
    });

  for (;;) {
    if (signal?.aborted) return notReady('cancelled');

    attempts++;
    const attempt = new AbortController();
    const remaining = Math.max(timeoutMs - (clock.now() - start), 0);
    try {
      if (await withTimeout(() => probe(attempt.signal), remaining, 'readiness probe', signal)) {
        return Success<Ready, NotReady>({ status: 'ready', attempts, elapsedMs: clock.now() - start });
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) lastError = errorMessage(error);
    } finally {
      attempt.abort();
    }
    if (signal?.aborted) return notReady('cancelled');

    const elapsed = clock.now() - start;
    if (elapsed >= timeoutMs) return notReady('timed_out');

    await clock.sleep(Math.min(pollIntervalMs, timeoutMs - elapsed), signal);
  }
}
