/**
 * AbortSignal helpers. Written against plain AbortController so they behave
 * the same under fake timers and do not depend on AbortSignal.any.
 */

export interface Deadline {
  signal: AbortSignal;
  /** True once the deadline itself (not a linked signal) fired */
  readonly expired: boolean;
  clear(): void;
}

/**
 * A signal that aborts after `ms`, or as soon as any of `linked` aborts.
 * Call `clear()` when the guarded work is finished.
 */
export function deadline(ms: number, ...linked: Array<AbortSignal | undefined>): Deadline {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`deadline of ${ms}ms exceeded`));
  }, ms);

  const cleanups: Array<() => void> = [];
  for (const signal of linked) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    get expired() {
      return expired;
    },
    clear() {
      clearTimeout(timer);
      for (const cleanup of cleanups) cleanup();
    },
  };
}

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts,
 * whichever comes first. The promise itself keeps running.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
