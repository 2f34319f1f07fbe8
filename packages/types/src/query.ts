export interface SearchRequest {
  query: string;
  /** Caller's access tags; a chunk matches when it shares at least one. */
  permissions: string[];
  topK?: number;
  scoreThreshold?: number;
  filter?: SearchFilter;
}

export interface SearchFilter {
  documentIds?: string[];
}

// Allowed filter fields
export const SEARCH_FILTER_ALLOWLIST = ["documentIds"] as const;

export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  orderIndex: number;
  text: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface SearchResult {
  chunks: ScoredChunk[];
  context: string;
  metadata: SearchMetadata;
}

export interface SearchMetadata {
  retrievalTimeMs: number;
  tokensUsed: number;
}
