/**
 * Retry controller port — re-runs an operation until it succeeds, the retry
 * budget runs out, or the caller's AbortSignal fires.
 */
import type { Result } from "../types/result.js";
import type { BackoffPolicy } from "./backoff.js";

/**
 * Receives every failed attempt, retried or terminal. Invoked synchronously;
 * `nextDelayMs` is 0 when `willRetry` is false.
 */
export type FailureObserver = (
  error: unknown,
  attempt: number,
  willRetry: boolean,
  nextDelayMs: number,
) => void;

/** Throwing or rejecting signals a failed attempt */
export type RetryOperation<T> = (attempt: number, signal: AbortSignal) => T | Promise<T>;

export interface Retrier {
  /** Retry budget; negative means unlimited */
  readonly retries: number;
  readonly unlimited: boolean;
  /** Active backoff policy */
  readonly backoff: BackoffPolicy;

  /** Replace the retry budget. Pass a negative number to retry forever. */
  setRetries(retries: number): void;
  setFixedBackoff(periodMs: number): void;
  setExponentialBackoff(initDelayMs: number, maxDelayMs: number, factor: number): void;
  /** Install any policy, including caller-defined ones */
  setBackoff(policy: BackoffPolicy): void;

  /**
   * Run `operation` until it succeeds or retries are exhausted.
   * Resolves to the operation's value, the last failure, or `signal.reason`.
   */
  execute<T>(signal: AbortSignal, operation: RetryOperation<T>): Promise<Result<T, unknown>>;
}
