import type { ContentBlock } from "./content-block.js";

export interface PipelineInput {
  documentId: string;
  content: Uint8Array | string;
  mimeType: string;
  permissions: readonly string[];
}

export interface ParseContext {
  documentId: string;
}

export interface ParsedDocument {
  blocks: ContentBlock[];
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorRecord {
  id: string;
  documentId: string;
  vector: number[];
  permissions: readonly string[];
  payload: Record<string, unknown>;
}
