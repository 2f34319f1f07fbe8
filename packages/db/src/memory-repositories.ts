import type { Chunk, DocumentStatus } from "@chunkwise/types";
import type {
  ChunkRepository,
  DocumentRecord,
  DocumentRepository,
  NewDocument,
  StatusUpdate,
} from "./repositories.js";

/** In-process document store for tests and local runs. */
export class InMemoryDocumentRepository implements DocumentRepository {
  private readonly records = new Map<string, DocumentRecord>();

  async upsert(document: NewDocument): Promise<DocumentRecord> {
    const now = new Date();
    const record: DocumentRecord = {
      id: document.id,
      sourcePath: document.sourcePath,
      mimeType: document.mimeType,
      permissions: [...document.permissions],
      status: "pending",
      chunkCount: 0,
      error: null,
      createdAt: this.records.get(document.id)?.createdAt ?? now,
      updatedAt: now,
    };
    this.records.set(document.id, record);
    return { ...record };
  }

  async findById(id: string): Promise<DocumentRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async updateStatus(id: string, status: DocumentStatus, update: StatusUpdate = {}): Promise<boolean> {
    const record = this.records.get(id);
    if (!record || (update.from && !update.from.includes(record.status))) {
      return false;
    }

    this.records.set(id, {
      ...record,
      status,
      updatedAt: new Date(),
      ...(update.chunkCount !== undefined ? { chunkCount: update.chunkCount } : {}),
      ...(update.error !== undefined ? { error: update.error } : {}),
    });
    return true;
  }
}

interface StoredChunk {
  chunk: Chunk;
  deliveredAt: Date | null;
}

/** In-process chunk store with the same at-most-once claim semantics as Postgres. */
export class InMemoryChunkRepository implements ChunkRepository {
  private readonly byDocument = new Map<string, StoredChunk[]>();

  async replaceForDocument(documentId: string, chunks: readonly Chunk[]): Promise<void> {
    this.byDocument.set(
      documentId,
      chunks.map((chunk) => ({ chunk, deliveredAt: null })),
    );
  }

  async findUndelivered(documentId: string): Promise<Chunk[]> {
    return (this.byDocument.get(documentId) ?? [])
      .filter((stored) => stored.deliveredAt === null)
      .map((stored) => stored.chunk)
      .sort((a, b) => a.orderIndex - b.orderIndex);
  }

  async claim(ids: readonly string[]): Promise<string[]> {
    const wanted = new Set(ids);
    const claimed: string[] = [];
    const now = new Date();

    for (const stored of this.allChunks()) {
      if (wanted.has(stored.chunk.id) && stored.deliveredAt === null) {
        stored.deliveredAt = now;
        claimed.push(stored.chunk.id);
      }
    }
    return claimed;
  }

  async deleteUndelivered(documentId: string): Promise<number> {
    const stored = this.byDocument.get(documentId) ?? [];
    const kept = stored.filter((s) => s.deliveredAt !== null);
    this.byDocument.set(documentId, kept);
    return stored.length - kept.length;
  }

  /** Ids of delivered chunks, for assertions. */
  deliveredIds(documentId: string): string[] {
    return (this.byDocument.get(documentId) ?? [])
      .filter((s) => s.deliveredAt !== null)
      .map((s) => s.chunk.id);
  }

  private *allChunks(): Generator<StoredChunk> {
    for (const stored of this.byDocument.values()) {
      yield* stored;
    }
  }
}
