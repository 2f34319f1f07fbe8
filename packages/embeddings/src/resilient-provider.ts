import type CircuitBreaker from "opossum";
import {
  AppError,
  ExternalServiceError,
  createCircuitBreaker,
  withRetry,
  type CircuitBreakerOptions,
  type RetryOptions,
} from "@chunkwise/errors";
import type { Logger } from "@chunkwise/logger";
import type { EmbeddingResult } from "@chunkwise/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

type EmbeddingCall = () => Promise<EmbeddingResult>;

export interface ResilienceOptions {
  retry?: Omit<RetryOptions, "operation" | "logger" | "signal">;
  circuitBreaker?: Omit<CircuitBreakerOptions, "logger">;
  logger?: Logger;
}

/**
 * Wraps a provider with retries and a circuit breaker. Failures surface as
 * `ExternalServiceError` naming the provider.
 */
export class ResilientEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  readonly embedImages?: (handles: string[]) => Promise<EmbeddingResult>;
  private readonly breaker: CircuitBreaker<[EmbeddingCall], EmbeddingResult>;

  constructor(
    private readonly inner: IEmbeddingProvider,
    private readonly options: ResilienceOptions = {},
  ) {
    this.name = inner.name;
    this.dimensions = inner.dimensions;
    this.breaker = createCircuitBreaker<[EmbeddingCall], EmbeddingResult>(
      `embeddings:${inner.name}`,
      (call) => call(),
      {
        ...options.circuitBreaker,
        ...(options.logger ? { logger: options.logger } : {}),
      },
    );

    if (inner.embedImages !== undefined) {
      const embedImages = inner.embedImages.bind(inner);
      this.embedImages = (handles) => this.run("embedImages", () => embedImages(handles));
    }
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.run("embed", () => this.inner.embed(text));
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.run("batchEmbed", () => this.inner.batchEmbed(texts));
  }

  async healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private async run(operation: string, call: EmbeddingCall): Promise<EmbeddingResult> {
    try {
      return await this.breaker.fire(() =>
        withRetry(call, {
          ...this.options.retry,
          operation: `${this.name}.${operation}`,
          ...(this.options.logger ? { logger: this.options.logger } : {}),
        }),
      );
    } catch (error: unknown) {
      if (AppError.isAppError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`${this.name} ${operation} failed: ${reason}`, this.name, {
        cause: error,
      });
    }
  }
}
