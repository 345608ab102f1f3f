/**
 * Canonical library error — every misuse the library reports is expressed
 * as an AppError so callers and loggers have a single shape.
 *
 * Operation failures are never converted: they reach the caller untouched.
 */

export const ErrorCode = {
  VALIDATION: "VALIDATION",
  INVALID_ATTEMPT: "INVALID_ATTEMPT",
  INVALID_DELAY: "INVALID_DELAY",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause !== undefined ? { ...error, details, cause } : { ...error, details };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const validation = (details: Record<string, unknown>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", details);

export const invalidAttempt = (attempt: number): AppError =>
  appError(ErrorCode.INVALID_ATTEMPT, `Attempt must be a positive integer, got ${attempt}`, {
    attempt,
  });

export const invalidDelay = (delayMs: number, attempt: number): AppError =>
  appError(
    ErrorCode.INVALID_DELAY,
    `Backoff policy returned an invalid delay (${delayMs}) for attempt ${attempt}`,
    { delayMs, attempt },
  );

/**
 * Throwable form of an AppError, used for programmer errors such as an
 * invalid backoff configuration or a policy returning a negative delay.
 */
export class RetryError extends Error implements AppError {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(error: AppError) {
    super(error.message, error.cause !== undefined ? { cause: error.cause } : undefined);
    this.name = "RetryError";
    this.code = error.code;
    if (error.details !== undefined) {
      this.details = error.details;
    }
  }
}

export const isRetryError = (value: unknown): value is RetryError => value instanceof RetryError;
