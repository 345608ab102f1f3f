import { z } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { issueDetails } from "../../shared/validation.js";

/**
 * Retry config — read from the environment and validated via Zod.
 * Every field has a default, so an empty environment is valid.
 */
const configSchema = z.object({
  retry: z.object({
    // Negative retries means "retry forever"
    retries: z.coerce.number().int().default(3),
    backoff: z.enum(["fixed", "exponential"]).default("fixed"),
    periodMs: z.coerce.number().finite().nonnegative().default(1_000),
    initDelayMs: z.coerce.number().finite().nonnegative().default(1_000),
    maxDelayMs: z.coerce.number().finite().nonnegative().default(30_000),
    factor: z.coerce.number().finite().min(1).default(2),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Result<AppConfig, AppError> => {
  const result = configSchema.safeParse({
    retry: {
      retries: env["RETRY_MAX_RETRIES"],
      backoff: env["RETRY_BACKOFF"],
      periodMs: env["RETRY_PERIOD_MS"],
      initDelayMs: env["RETRY_INIT_DELAY_MS"],
      maxDelayMs: env["RETRY_MAX_DELAY_MS"],
      factor: env["RETRY_FACTOR"],
    },
    log: {
      level: env["LOG_LEVEL"],
      format: env["LOG_FORMAT"],
    },
  });

  if (!result.success) {
    return err(validation(issueDetails(result.error)));
  }

  return ok(result.data);
};
