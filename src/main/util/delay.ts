/**
 * Sleep for `ms`, or reject with the signal's reason as soon as it aborts.
 *
 * Built on the global timer functions so fake timers drive it in tests.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const on_abort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', on_abort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', on_abort, { once: true });
  });
}
