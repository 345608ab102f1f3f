/**
 * Public entry point.
 *
 * @example
 * const retrier = createRetrier(3);
 * retrier.setExponentialBackoff(500, 5_000, 2);
 * const result = await retrier.execute(AbortSignal.timeout(30_000), () => fetchReport());
 * if (!result.ok) throw result.error;
 */
export * from "./core/index.js";
export * from "./infrastructure/index.js";
export { sleep, MAX_TIMER_MS } from "./shared/utils/sleep.js";
