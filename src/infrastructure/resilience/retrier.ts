/**
 * Retry controller — re-runs an operation with a pluggable backoff between
 * attempts, until it succeeds, the budget runs out, or the signal aborts.
 *
 * Loop per execute():
 *   CheckCancel → Invoke → Success → ok(value)
 *                        → Failure → budget left → observe(willRetry) → wait → CheckCancel
 *                                  → exhausted   → observe(final)     → err(lastError)
 *
 * The budget check runs after the attempt counter is incremented
 * (`attempt <= retries`), so N retries allow N + 1 attempts in total.
 *
 * Configuration is read live and without locking: calls running concurrently
 * on one retrier see reconfiguration mid-flight. Avoid changing it while an
 * execution is in progress.
 */

import { z } from "zod";
import { RetryError, invalidAttempt, invalidDelay, validation } from "../../core/errors/app-error.js";
import type { BackoffPolicy } from "../../core/ports/backoff.js";
import type { FailureObserver, Retrier, RetryOperation } from "../../core/ports/retrier.js";
import { type Result, err, tryCatchAsync } from "../../core/types/result.js";
import { sleep } from "../../shared/utils/sleep.js";
import { issueDetails } from "../../shared/validation.js";
import { createExponentialBackoff, createFixedBackoff } from "./backoff.js";

export const DEFAULT_PERIOD_MS = 1000;

const retriesSchema = z.number().int();

const checkRetries = (retries: number): number => {
  const result = retriesSchema.safeParse(retries);
  if (!result.success) {
    throw new RetryError(validation(issueDetails(result.error)));
  }
  return result.data;
};

/** Guard the policy boundary: positive integer in, finite non-negative delay out */
const delayFor = (policy: BackoffPolicy, attempt: number): number => {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RetryError(invalidAttempt(attempt));
  }
  const delay = policy.computeDelay(attempt);
  if (!Number.isFinite(delay) || delay < 0) {
    throw new RetryError(invalidDelay(delay, attempt));
  }
  return delay;
};

export const createRetrier = (retries: number, onFailure?: FailureObserver): Retrier => {
  let budget = checkRetries(retries);
  let backoff: BackoffPolicy = createFixedBackoff(DEFAULT_PERIOD_MS);

  return {
    get retries() {
      return budget;
    },

    get unlimited() {
      return budget < 0;
    },

    get backoff() {
      return backoff;
    },

    setRetries(next: number): void {
      budget = checkRetries(next);
    },

    setFixedBackoff(periodMs: number): void {
      backoff = createFixedBackoff(periodMs);
    },

    setExponentialBackoff(initDelayMs: number, maxDelayMs: number, factor: number): void {
      backoff = createExponentialBackoff({ initDelayMs, maxDelayMs, factor });
    },

    setBackoff(policy: BackoffPolicy): void {
      backoff = policy;
    },

    async execute<T>(signal: AbortSignal, operation: RetryOperation<T>): Promise<Result<T, unknown>> {
      let attempt = 0;

      for (;;) {
        if (signal.aborted) return err(signal.reason);

        attempt++;
        const outcome = await tryCatchAsync(() => operation(attempt, signal));
        if (outcome.ok) return outcome;

        const willRetry = budget < 0 || attempt <= budget;
        if (!willRetry) {
          onFailure?.(outcome.error, attempt, false, 0);
          return err(outcome.error);
        }

        const delay = delayFor(backoff, attempt);
        onFailure?.(outcome.error, attempt, true, delay);

        const elapsed = await sleep(delay, signal);
        if (!elapsed) return err(signal.reason);
      }
    },
  };
};
