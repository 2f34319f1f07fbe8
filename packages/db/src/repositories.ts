import type { Chunk, DocumentStatus } from "@chunkwise/types";

export interface DocumentRecord {
  id: string;
  sourcePath: string;
  mimeType: string;
  permissions: string[];
  status: DocumentStatus;
  chunkCount: number;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewDocument {
  id: string;
  sourcePath: string;
  mimeType: string;
  permissions: readonly string[];
}

export interface StatusUpdate {
  /** Only update when the current status is one of these. */
  from?: readonly DocumentStatus[];
  chunkCount?: number;
  error?: string | null;
}

export interface DocumentRepository {
  /** Insert, or reset an existing document to `pending` for re-ingestion. */
  upsert(document: NewDocument): Promise<DocumentRecord>;
  findById(id: string): Promise<DocumentRecord | null>;
  /** Returns false when the document is missing or not in an allowed `from` status. */
  updateStatus(id: string, status: DocumentStatus, update?: StatusUpdate): Promise<boolean>;
}

export interface ChunkRepository {
  /** Replace every stored chunk of the document with `chunks`. */
  replaceForDocument(documentId: string, chunks: readonly Chunk[]): Promise<void>;
  /** Chunks not yet claimed for delivery, in reading order. */
  findUndelivered(documentId: string): Promise<Chunk[]>;
  /**
   * Mark chunks as delivered. Returns only the ids this call claimed; ids that
   * were already claimed are left out, so each chunk is handed out at most once.
   */
  claim(ids: readonly string[]): Promise<string[]>;
  /** Returns the number of chunks removed. */
  deleteUndelivered(documentId: string): Promise<number>;
}
