/**
 * Built-in backoff policies.
 *
 *   fixed:        delay = period
 *   exponential:  delay = min(factor^(attempt-1) × initDelay, maxDelay)
 *
 * Both are frozen once built; swap the policy on the retrier to change it.
 */

import { z } from "zod";
import { RetryError, validation } from "../../core/errors/app-error.js";
import type {
  ExponentialBackoff,
  ExponentialBackoffOptions,
  FixedBackoff,
} from "../../core/ports/backoff.js";
import { issueDetails } from "../../shared/validation.js";

const delayMs = z.number().finite().nonnegative();

const fixedSchema = z.object({ periodMs: delayMs });

const exponentialSchema = z.object({
  initDelayMs: delayMs,
  maxDelayMs: delayMs,
  factor: z.number().finite().min(1),
});

const parseOrThrow = <T>(schema: z.ZodType<T>, input: unknown): T => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RetryError(validation(issueDetails(result.error)));
  }
  return result.data;
};

export const createFixedBackoff = (periodMs: number): FixedBackoff => {
  const config = parseOrThrow(fixedSchema, { periodMs });

  const policy: FixedBackoff = {
    kind: "fixed",
    periodMs: config.periodMs,
    computeDelay: (_attempt: number) => config.periodMs,
  };
  return Object.freeze(policy);
};

export const createExponentialBackoff = (options: ExponentialBackoffOptions): ExponentialBackoff => {
  const { initDelayMs, maxDelayMs, factor } = parseOrThrow(exponentialSchema, options);

  const policy: ExponentialBackoff = {
    kind: "exponential",
    initDelayMs,
    maxDelayMs,
    factor,
    computeDelay(attempt: number): number {
      // Float math: a huge attempt overflows to Infinity and is clamped below
      const raw = factor ** (attempt - 1) * initDelayMs;
      // 0 × Infinity
      if (Number.isNaN(raw)) return 0;
      return Math.trunc(Math.min(raw, maxDelayMs));
    },
  };
  return Object.freeze(policy);
};
