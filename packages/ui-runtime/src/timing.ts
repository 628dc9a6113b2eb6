import { CancellationError } from "./errors";

/**
 * Monotonic clock in milliseconds. Components take one in their options so
 * tests can drive time with fake timers.
 */
export type Clock = () => number;

export const monotonicNow: Clock = () => performance.now();

/**
 * Resolve after `ms`, or reject with the signal's reason (a
 * CancellationError by default) as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new CancellationError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new CancellationError();
}
