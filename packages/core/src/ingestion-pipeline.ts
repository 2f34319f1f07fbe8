import type {
  Chunk,
  ChunkingConfig,
  EmbeddingResult,
  PipelineInput,
  VectorRecord,
} from "@chunkwise/types";
import type { Logger } from "@chunkwise/logger";
import type { IParser } from "@chunkwise/parser";
import { getParser } from "@chunkwise/parser";
import type { ChunkingResult, IChunker } from "@chunkwise/chunker";
import type { IEmbeddingProvider } from "@chunkwise/embeddings";
import type { IVectorStore } from "@chunkwise/vector-store";

export interface PreparationDependencies {
  chunker: IChunker;
  config: ChunkingConfig;
  /** Defaults to the parser registered for `input.mimeType`. */
  parser?: IParser;
  logger?: Logger;
}

export interface PreparedDocument extends ChunkingResult {
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface DeliveryDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
  logger?: Logger;
}

export interface DeliveryOptions {
  signal?: AbortSignal;
}

export type DeliveryStatus = "delivered" | "cancelled";

export interface DeliveryResult {
  documentId: string;
  status: DeliveryStatus;
  /** Chunks written to the vector store. Zero when cancelled. */
  storedCount: number;
  tokensUsed: number;
}

export type IngestionDependencies = PreparationDependencies & DeliveryDependencies;

export interface IngestionResult extends DeliveryResult {
  chunkCount: number;
  warnings: ChunkingResult["warnings"];
  errors: ChunkingResult["errors"];
}

/**
 * Parse -> Chunk. Pure apart from the parser; nothing is embedded or stored.
 */
export async function prepareChunks(
  input: PipelineInput,
  deps: PreparationDependencies,
): Promise<PreparedDocument> {
  const parser = deps.parser ?? getParser(input.mimeType);
  const parsed = await parser.parse(input.content, input.mimeType, {
    documentId: input.documentId,
  });

  const result = deps.chunker.chunk(
    { documentId: input.documentId, permissions: input.permissions, blocks: parsed.blocks },
    deps.config,
  );

  deps.logger?.info(
    {
      documentId: input.documentId,
      blockCount: parsed.blocks.length,
      chunkCount: result.chunks.length,
      skippedBlocks: result.errors.length,
    },
    "Document prepared",
  );

  return { ...result, pageCount: parsed.pageCount, metadata: parsed.metadata };
}

/**
 * Embed -> Store.
 *
 * The signal is checked before embedding and again before storing; once it
 * has fired nothing reaches the vector store.
 */
export async function deliverChunks(
  documentId: string,
  chunks: readonly Chunk[],
  deps: DeliveryDependencies,
  options: DeliveryOptions = {},
): Promise<DeliveryResult> {
  const cancelled = (): DeliveryResult => {
    deps.logger?.info({ documentId, chunkCount: chunks.length }, "Delivery cancelled");
    return { documentId, status: "cancelled", storedCount: 0, tokensUsed: 0 };
  };

  if (options.signal?.aborted) return cancelled();
  if (chunks.length === 0) {
    return { documentId, status: "delivered", storedCount: 0, tokensUsed: 0 };
  }

  const { vectors, tokensUsed } = await embedChunks(chunks, deps.embeddingProvider);

  if (options.signal?.aborted) return cancelled();

  const records: VectorRecord[] = chunks.map((chunk, i) => {
    const vector = vectors[i];
    if (!vector) {
      throw new Error(`Missing embedding for chunk ${String(chunk.orderIndex)} of ${documentId}`);
    }
    return {
      id: chunk.id,
      documentId: chunk.documentId,
      vector,
      permissions: chunk.permissions,
      payload: toPayload(chunk),
    };
  });

  await deps.vectorStore.upsert(deps.collectionName, records);

  deps.logger?.info({ documentId, storedCount: records.length, tokensUsed }, "Chunks stored");

  return { documentId, status: "delivered", storedCount: records.length, tokensUsed };
}

/**
 * Ingestion pipeline: Parse -> Chunk -> Embed -> Store
 */
export async function ingest(
  input: PipelineInput,
  deps: IngestionDependencies,
  options: DeliveryOptions = {},
): Promise<IngestionResult> {
  const prepared = await prepareChunks(input, deps);
  const delivery = await deliverChunks(input.documentId, prepared.chunks, deps, options);

  return {
    ...delivery,
    chunkCount: prepared.chunks.length,
    warnings: prepared.warnings,
    errors: prepared.errors,
  };
}

/**
 * Image chunks with a handle go through the provider's image mode when it has
 * one; everything else embeds its text. Vectors come back in chunk order.
 */
async function embedChunks(
  chunks: readonly Chunk[],
  provider: IEmbeddingProvider,
): Promise<{ vectors: number[][]; tokensUsed: number }> {
  const textIndexes: number[] = [];
  const imageIndexes: number[] = [];
  const images: string[] = [];

  chunks.forEach((chunk, i) => {
    if (chunk.type === "image" && chunk.imageHandle && provider.embedImages) {
      imageIndexes.push(i);
      images.push(chunk.imageHandle);
    } else {
      textIndexes.push(i);
    }
  });

  const vectors: number[][] = new Array<number[]>(chunks.length);
  let tokensUsed = 0;

  const place = (result: EmbeddingResult, indexes: number[]) => {
    if (result.embeddings.length !== indexes.length) {
      throw new Error(
        `${provider.name} returned ${String(result.embeddings.length)} embeddings for ${String(indexes.length)} inputs`,
      );
    }
    indexes.forEach((chunkIndex, i) => {
      const embedding = result.embeddings[i];
      if (embedding) vectors[chunkIndex] = embedding;
    });
    tokensUsed += result.tokensUsed;
  };

  if (textIndexes.length > 0) {
    const texts = textIndexes.map((i) => chunks[i]?.text ?? "");
    place(await provider.batchEmbed(texts), textIndexes);
  }

  if (imageIndexes.length > 0 && provider.embedImages) {
    place(await provider.embedImages(images), imageIndexes);
  }

  return { vectors, tokensUsed };
}

function toPayload(chunk: Chunk): Record<string, unknown> {
  return {
    chunkId: chunk.id,
    type: chunk.type,
    text: chunk.text,
    tokenEstimate: chunk.tokenEstimate,
    orderIndex: chunk.orderIndex,
    page: chunk.page,
    pages: chunk.pages,
    section: chunk.section,
    sectionPath: chunk.sectionPath,
    oversized: chunk.oversized,
    overlap: chunk.overlap,
    sourceBlockIds: chunk.sourceBlockIds,
    ...(chunk.rowRange ? { rowStart: chunk.rowRange.start, rowEnd: chunk.rowRange.end } : {}),
    ...(chunk.imageHandle ? { imageHandle: chunk.imageHandle } : {}),
  };
}
