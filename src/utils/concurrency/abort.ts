/**
 * Cancellation helpers
 *
 * Every suspension point (gate acquisition, backoff sleep, network call,
 * single-flight wait) observes the caller's AbortSignal through these
 * helpers and rejects with RequestCancelledError.
 */

import { RequestCancelledError } from '../../clients/http/errors.js';

/**
 * Throw RequestCancelledError if the signal has already fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, url?: string): void {
  if (signal?.aborted) {
    throw new RequestCancelledError(url, signal.reason);
  }
}

/**
 * Sleep for `ms` milliseconds, rejecting early if the signal fires
 *
 * @example
 * ```typescript
 * await sleep(backoff.remainingMs(), signal);
 * ```
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError(undefined, signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelledError(undefined, signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject as soon as `signal` fires
 *
 * The underlying work is not stopped; only this caller stops waiting for it.
 * Used by callers that join an in-flight request started by someone else.
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  url?: string
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new RequestCancelledError(url, signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestCancelledError(url, signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Create an AbortController that also aborts when `parent` does
 *
 * @returns The controller and a `dispose` function that detaches it from the parent
 */
export function createLinkedAbortController(parent?: AbortSignal): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();

  if (!parent) {
    return { controller, dispose: () => undefined };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }

  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });

  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort),
  };
}
