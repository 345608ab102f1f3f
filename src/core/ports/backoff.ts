/**
 * Backoff policy port — how long to pause before the next attempt.
 *
 * `computeDelay` is pure and total for `attempt >= 1` (1-indexed count of
 * attempts made so far) and never returns a negative number of milliseconds.
 */
export interface BackoffPolicy {
  computeDelay(attempt: number): number;
}

/** Pauses for the same period before every retry */
export interface FixedBackoff extends BackoffPolicy {
  readonly kind: "fixed";
  readonly periodMs: number;
}

/** min(factor^(attempt-1) × initDelayMs, maxDelayMs), truncated to whole ms */
export interface ExponentialBackoff extends BackoffPolicy {
  readonly kind: "exponential";
  readonly initDelayMs: number;
  readonly maxDelayMs: number;
  readonly factor: number;
}

export interface ExponentialBackoffOptions {
  /** Delay in ms after the first failed attempt */
  readonly initDelayMs: number;
  /** Upper bound in ms for any single delay */
  readonly maxDelayMs: number;
  /** Base of the power by which the delay grows (>= 1) */
  readonly factor: number;
}
