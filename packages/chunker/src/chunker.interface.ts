import type { MalformedBlockError } from "@chunkwise/errors";
import type { Chunk, ChunkingConfig, ChunkingWarning, DocumentInput } from "@chunkwise/types";

export interface ChunkingResult {
  documentId: string;
  chunks: Chunk[];
  warnings: ChunkingWarning[];
  /** Blocks that were skipped. The rest of the document is still chunked. */
  errors: MalformedBlockError[];
}

export interface IChunker {
  readonly strategy: string;
  chunk(document: DocumentInput, config: ChunkingConfig): ChunkingResult;
}
