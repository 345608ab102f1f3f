export { createLogger, type LogFormat } from "./logger.js";
export { createFailureLogger } from "./failure-logger.js";
