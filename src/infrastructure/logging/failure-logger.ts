import type { Logger } from "../../core/ports/logger.js";
import type { FailureObserver } from "../../core/ports/retrier.js";

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Failure observer that reports each failed attempt through a Logger:
 * warn while retries remain, error once the budget is spent.
 */
export const createFailureLogger = (logger: Logger): FailureObserver => {
  return (error, attempt, willRetry, nextDelayMs) => {
    if (willRetry) {
      logger.warn("Attempt failed, retrying", {
        attempt,
        delayMs: nextDelayMs,
        error: describeError(error),
      });
      return;
    }
    logger.error("Attempt failed, giving up", { attempt, error: describeError(error) });
  };
};
