/**
 * Async helpers
 *
 * Abortable sleep, bounded operations and the clock abstraction the
 * scheduler paces against.
 */

import { CancelledError } from "../core/app-error";

/**
 * Time source used by pacing loops
 */
export interface Clock {
  /** Monotonic milliseconds */
  now(): number;
  /** Wall clock milliseconds since epoch */
  wallTime(): number;
  /** Resolves after ms, rejects with CancelledError when signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Sleep helper
 *
 * Rejects with CancelledError as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => performance.now(),
  wallTime: () => Date.now(),
  sleep,
};

/**
 * Run an operation with a deadline and a cancellation signal
 *
 * The operation receives a signal that aborts on timeout or on the outer
 * signal. A late settlement of the abandoned operation is ignored.
 *
 * @param onTimeout - builds the error thrown when the deadline passes
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      fn();
    };

    const onAbort = () => {
      controller.abort();
      finish(() => reject(new CancelledError()));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(onTimeout()));
    }, timeoutMs);

    signal?.addEventListener("abort", onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      finish(() => reject(error));
      return;
    }

    pending.then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}
