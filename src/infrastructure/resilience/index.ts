export { createFixedBackoff, createExponentialBackoff } from "./backoff.js";
export { createRetrier, DEFAULT_PERIOD_MS } from "./retrier.js";
export { createRetrierFromConfig } from "./from-config.js";
