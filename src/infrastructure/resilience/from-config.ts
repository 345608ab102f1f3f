import type { Logger } from "../../core/ports/logger.js";
import type { Retrier } from "../../core/ports/retrier.js";
import type { AppConfig } from "../config/config.js";
import { createFailureLogger } from "../logging/failure-logger.js";
import { createRetrier } from "./retrier.js";

/**
 * Build a retrier from loaded config. Failures are logged only when a
 * logger is supplied.
 */
export const createRetrierFromConfig = (config: AppConfig, logger?: Logger): Retrier => {
  const { retry } = config;
  const observer = logger ? createFailureLogger(logger.child({ component: "retrier" })) : undefined;
  const retrier = createRetrier(retry.retries, observer);

  if (retry.backoff === "exponential") {
    retrier.setExponentialBackoff(retry.initDelayMs, retry.maxDelayMs, retry.factor);
  } else {
    retrier.setFixedBackoff(retry.periodMs);
  }

  return retrier;
};
