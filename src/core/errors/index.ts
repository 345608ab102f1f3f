export {
  type AppError,
  ErrorCode,
  appError,
  validation,
  invalidAttempt,
  invalidDelay,
  RetryError,
  isRetryError,
} from "./app-error.js";
