import type { SearchRequest, SearchResult, ScoredChunk, SearchMetadata } from "@chunkwise/types";
import type { IEmbeddingProvider } from "@chunkwise/embeddings";
import type { IVectorStore, VectorSearchResult } from "@chunkwise/vector-store";
import { validateSearchFilter } from "./filter-validator.js";
import { assembleContext } from "./context-assembler.js";

const DEFAULT_TOP_K = 10;

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  collectionName: string;
}

/**
 * Retrieval pipeline: Query -> Embed -> Vector Search -> Assemble Context
 *
 * Filters are allowlisted. The caller's permissions are always part of the
 * search; the vector store rejects a search without them.
 */
export async function retrieve(
  request: SearchRequest,
  deps: RetrievalDependencies,
): Promise<SearchResult> {
  const startTime = Date.now();

  if (request.filter) {
    validateSearchFilter(request.filter);
  }

  const embeddingResult = await deps.embeddingProvider.embed(request.query);
  const queryVector = embeddingResult.embeddings[0];

  if (!queryVector) {
    throw new Error("Failed to generate embedding for query");
  }

  const searchResults = await deps.vectorStore.search(deps.collectionName, {
    vector: queryVector,
    permissions: request.permissions,
    topK: request.topK ?? DEFAULT_TOP_K,
    scoreThreshold: request.scoreThreshold,
    filter: request.filter?.documentIds ? { documentIds: request.filter.documentIds } : undefined,
  });

  const chunks = searchResults.map(toScoredChunk);

  const metadata: SearchMetadata = {
    retrievalTimeMs: Date.now() - startTime,
    tokensUsed: embeddingResult.tokensUsed,
  };

  return {
    chunks,
    context: assembleContext(chunks),
    metadata,
  };
}

function toScoredChunk(result: VectorSearchResult): ScoredChunk {
  const { payload } = result;
  return {
    chunkId: result.id,
    documentId: typeof payload["documentId"] === "string" ? payload["documentId"] : "",
    orderIndex: typeof payload["orderIndex"] === "number" ? payload["orderIndex"] : 0,
    text: typeof payload["text"] === "string" ? payload["text"] : "",
    score: result.score,
    metadata: payload,
  };
}
