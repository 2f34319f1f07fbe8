export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ConfigurationError,
  MalformedBlockError,
  ValidationError,
  NotFoundError,
  ExternalServiceError,
} from "./errors.js";
export type { BlockReference } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
