import type { IChunker } from "@chunkwise/chunker";
import type { ChunkRepository, DocumentRepository } from "@chunkwise/db";
import type { IEmbeddingProvider } from "@chunkwise/embeddings";
import type { Logger } from "@chunkwise/logger";
import type { ChunkingConfig, EmbedJobData } from "@chunkwise/types";
import type { IVectorStore } from "@chunkwise/vector-store";

/** Everything a processor needs, built once in main and shared by every job. */
export interface WorkerContext {
  documents: DocumentRepository;
  chunks: ChunkRepository;
  chunker: IChunker;
  chunking: ChunkingConfig;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  logger: Logger;
  readSource(path: string): Promise<Uint8Array>;
  enqueueEmbed(data: EmbedJobData): Promise<void>;
  /** Drop a waiting embed job for the document, if there is one. */
  removeEmbed(documentId: string): Promise<void>;
  /** Fires on shutdown; in-flight deliveries stop before storing. */
  signal?: AbortSignal;
}
