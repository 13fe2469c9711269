/**
 * Timer helpers that honor an AbortSignal, so a deadline interrupts a
 * pending wait instead of being checked only between iterations.
 */

/**
 * Returns a promise that resolves after `ms` milliseconds, or rejects with
 * `signal.reason` as soon as the signal aborts.
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
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface Deadline {
  readonly signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal. */
  dispose(): void;
}

/**
 * Creates an abort scope that fires after `timeoutMs` with the error built
 * by `onExpire`, or earlier when `parent` aborts (with the parent's reason).
 * Callers must `dispose()` once the guarded work settles.
 */
export function createDeadline(
  timeoutMs: number,
  onExpire: () => Error,
  parent?: AbortSignal,
): Deadline {
  const controller = new AbortController();

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  const timer = setTimeout(() => {
    controller.abort(onExpire());
  }, Math.max(0, timeoutMs));

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Milliseconds elapsed since `startedAt` (a `Date.now()` value).
 */
export function elapsedSince(startedAt: number): number {
  return Date.now() - startedAt;
}
