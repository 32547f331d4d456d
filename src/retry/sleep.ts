/**
 * Wait `ms` without blocking the event loop. Resolves `true` when the full
 * delay elapsed and `false` as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

const SLEEP_CELL = new Int32Array(new SharedArrayBuffer(4));

/** Block the calling thread for `ms`. Nothing else on this thread runs meanwhile. */
export function sleepSync(ms: number): void {
  if (ms <= 0) return;
  Atomics.wait(SLEEP_CELL, 0, 0, ms);
}
