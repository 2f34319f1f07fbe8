import CircuitBreaker from "opossum";
import { createLogger, type Logger } from "@chunkwise/logger";
import { AppError } from "./app-error.js";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 30000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  logger?: Logger;
}

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout">
> = {
  // Batch embedding calls are slower than the usual request/response round trip
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

/**
 * Client errors (4xx) say nothing about the health of the remote service,
 * so they never count towards opening the circuit.
 */
function isClientError(err: unknown): boolean {
  return AppError.isAppError(err) && err.statusCode >= 400 && err.statusCode < 500;
}

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const { logger: providedLogger, ...breakerOptions } = options ?? {};
  const logger = providedLogger ?? createLogger({ service: "circuit-breaker" });

  const breaker = new CircuitBreaker<TArgs, TResult>(fn, {
    ...DEFAULT_OPTIONS,
    ...breakerOptions,
    name,
    errorFilter: isClientError,
  });

  breaker.on("open", () => {
    logger.warn({ breaker: name }, "circuit opened, requests will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger.warn({ breaker: name }, "circuit half-open, next request is a probe");
  });

  breaker.on("close", () => {
    logger.info({ breaker: name }, "circuit closed");
  });

  return breaker;
}
