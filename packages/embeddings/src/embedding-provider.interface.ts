import type { EmbeddingResult } from "@chunkwise/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  embed(text: string): Promise<EmbeddingResult>;
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  /** Present only on providers with an image input mode. */
  embedImages?(handles: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
