import type { VectorRecord } from "@chunkwise/types";

export interface VectorSearchParams {
  vector: number[];
  /** Access tags of the caller. A point matches when it carries any of them. */
  permissions: readonly string[];
  topK: number;
  scoreThreshold?: number;
  filter?: VectorFilter;
}

export interface VectorFilter {
  documentIds?: string[];
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface IVectorStore {
  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  delete(collectionName: string, ids: string[]): Promise<void>;
  deleteByDocument(collectionName: string, documentId: string): Promise<void>;
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
