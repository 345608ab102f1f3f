export type { Logger, LogLevel, LogMeta } from "./logger.js";
export type {
  BackoffPolicy,
  FixedBackoff,
  ExponentialBackoff,
  ExponentialBackoffOptions,
} from "./backoff.js";
export type { Retrier, RetryOperation, FailureObserver } from "./retrier.js";
