import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@chunkwise/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit
const IMAGE_BATCH_SIZE = 1;

type CohereInput = { texts: string[] } | { images: string[] };

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedInBatches(texts, BATCH_SIZE, (batch) => ({ texts: batch }));
  }

  /**
   * Embed images through the same model, one request per image.
   * Handles must be data URIs (`data:image/png;base64,...`).
   */
  async embedImages(handles: string[]): Promise<EmbeddingResult> {
    return this.embedInBatches(handles, IMAGE_BATCH_SIZE, (batch) => ({ images: batch }));
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async embedInBatches(
    inputs: string[],
    batchSize: number,
    toRequest: (batch: string[]) => CohereInput,
  ): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < inputs.length; i += batchSize) {
      const request = toRequest(inputs.slice(i, i + batchSize));

      const response = await this.client.v2.embed({
        ...request,
        model: this.model,
        inputType: "texts" in request ? "search_document" : "image",
        embeddingTypes: ["float"],
      });

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      // Use actual tokensUsed from Cohere response for billing accuracy
      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
