// Timeout and cancellation helpers shared by every suspension point

/**
 * Settle with `promise`, or reject with `onTimeout()` once `ms` elapses.
 * The timer is cleared either way.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("Operation aborted");
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it aborts.
 * A late settlement of `promise` is observed and dropped.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export interface LinkedAbort {
  readonly signal: AbortSignal;
  /** True when the abort came from the timer rather than the parent. */
  readonly timedOut: boolean;
  /** Detach from the parent and clear the timer. */
  dispose(): void;
}

/**
 * A child signal that aborts when `parent` aborts or after `timeoutMs`,
 * whichever comes first. Always call dispose() when the guarded work settles.
 */
export function linkAbort(
  parent: AbortSignal | undefined,
  timeoutMs: number | undefined,
  onTimeout: () => Error,
): LinkedAbort {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => {
    if (parent) controller.abort(abortReason(parent));
  };

  if (parent?.aborted) {
    controller.abort(abortReason(parent));
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort(onTimeout());
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
