export { loadConfig, type AppConfig } from "./config/index.js";
export { createLogger, createFailureLogger, type LogFormat } from "./logging/index.js";
export {
  createFixedBackoff,
  createExponentialBackoff,
  createRetrier,
  createRetrierFromConfig,
  DEFAULT_PERIOD_MS,
} from "./resilience/index.js";
