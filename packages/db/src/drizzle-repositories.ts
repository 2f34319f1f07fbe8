import { and, asc, eq, inArray, isNull } from "drizzle-orm";
import type { Chunk, DocumentStatus } from "@chunkwise/types";
import type { DbClient } from "./client.js";
import { documents } from "./schema/documents.js";
import { chunks } from "./schema/chunks.js";
import { fromChunkRow, toChunkRow } from "./chunk-mapper.js";
import type {
  ChunkRepository,
  DocumentRecord,
  DocumentRepository,
  NewDocument,
  StatusUpdate,
} from "./repositories.js";

const INSERT_BATCH_SIZE = 500;

export class DrizzleDocumentRepository implements DocumentRepository {
  constructor(private readonly db: DbClient) {}

  async upsert(document: NewDocument): Promise<DocumentRecord> {
    const values = {
      id: document.id,
      sourcePath: document.sourcePath,
      mimeType: document.mimeType,
      permissions: [...document.permissions],
    };

    const [row] = await this.db
      .insert(documents)
      .values(values)
      .onConflictDoUpdate({
        target: documents.id,
        set: { ...values, status: "pending", chunkCount: 0, error: null, updatedAt: new Date() },
      })
      .returning();

    if (!row) {
      throw new Error(`Failed to upsert document ${document.id}`);
    }
    return row;
  }

  async findById(id: string): Promise<DocumentRecord | null> {
    const row = await this.db.query.documents.findFirst({ where: eq(documents.id, id) });
    return row ?? null;
  }

  async updateStatus(id: string, status: DocumentStatus, update: StatusUpdate = {}): Promise<boolean> {
    const conditions = [eq(documents.id, id)];
    if (update.from) {
      conditions.push(inArray(documents.status, [...update.from]));
    }

    const rows = await this.db
      .update(documents)
      .set({
        status,
        updatedAt: new Date(),
        ...(update.chunkCount !== undefined ? { chunkCount: update.chunkCount } : {}),
        ...(update.error !== undefined ? { error: update.error } : {}),
      })
      .where(and(...conditions))
      .returning({ id: documents.id });

    return rows.length > 0;
  }
}

export class DrizzleChunkRepository implements ChunkRepository {
  constructor(private readonly db: DbClient) {}

  async replaceForDocument(documentId: string, documentChunks: readonly Chunk[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(chunks).where(eq(chunks.documentId, documentId));

      const rows = documentChunks.map(toChunkRow);
      for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
        await tx.insert(chunks).values(rows.slice(i, i + INSERT_BATCH_SIZE));
      }
    });
  }

  async findUndelivered(documentId: string): Promise<Chunk[]> {
    const rows = await this.db
      .select()
      .from(chunks)
      .where(and(eq(chunks.documentId, documentId), isNull(chunks.deliveredAt)))
      .orderBy(asc(chunks.orderIndex));

    return rows.map(fromChunkRow);
  }

  async claim(ids: readonly string[]): Promise<string[]> {
    if (ids.length === 0) {
      return [];
    }

    // Single conditional UPDATE: concurrent claimers never both see the same row as unclaimed
    const rows = await this.db
      .update(chunks)
      .set({ deliveredAt: new Date() })
      .where(and(inArray(chunks.id, [...ids]), isNull(chunks.deliveredAt)))
      .returning({ id: chunks.id });

    return rows.map((r) => r.id);
  }

  async deleteUndelivered(documentId: string): Promise<number> {
    const rows = await this.db
      .delete(chunks)
      .where(and(eq(chunks.documentId, documentId), isNull(chunks.deliveredAt)))
      .returning({ id: chunks.id });

    return rows.length;
  }
}
