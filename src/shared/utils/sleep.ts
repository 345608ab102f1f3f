/**
 * Cancellable sleep — races a timer against an AbortSignal.
 *
 * Resolves `true` once the full delay has elapsed and `false` the moment the
 * signal aborts. Never rejects; the caller decides what an abort means.
 */

/** setTimeout fires immediately for anything above a signed 32-bit int */
export const MAX_TIMER_MS = 2_147_483_647;

export const sleep = (ms: number, signal?: AbortSignal): Promise<boolean> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    let remaining = Math.max(0, ms);
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const schedule = (): void => {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      }, chunk);
    };

    signal?.addEventListener("abort", onAbort, { once: true });
    schedule();
  });
