import { ConfigurationError } from "@chunkwise/errors";
import type { EmbeddingConfig } from "@chunkwise/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

/**
 * Builds the provider named by the app's embedding config. The configured
 * dimensions are passed through so the vector collection and the provider agree.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohereApiKey) {
        throw new ConfigurationError("COHERE_API_KEY is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({
        apiKey: config.cohereApiKey,
        model: config.cohereModel,
        dimensions: config.dimensions,
      });
    case "bge-m3":
      if (!config.bgeM3Url) {
        throw new ConfigurationError("BGE_M3_URL is required when provider is 'bge-m3'");
      }
      return new BgeM3EmbeddingProvider({ baseUrl: config.bgeM3Url, dimensions: config.dimensions });
    default: {
      const unknownProvider: never = config.provider;
      throw new ConfigurationError(`Unknown embedding provider: ${String(unknownProvider)}`);
    }
  }
}
