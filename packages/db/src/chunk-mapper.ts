import type { Chunk } from "@chunkwise/types";
import type { chunks } from "./schema/chunks.js";

export type ChunkRow = typeof chunks.$inferSelect;
export type NewChunkRow = typeof chunks.$inferInsert;

export function toChunkRow(chunk: Chunk): NewChunkRow {
  return {
    id: chunk.id,
    documentId: chunk.documentId,
    orderIndex: chunk.orderIndex,
    type: chunk.type,
    text: chunk.text,
    tokenEstimate: chunk.tokenEstimate,
    page: chunk.page,
    pages: [...chunk.pages],
    sectionPath: [...chunk.sectionPath],
    permissions: [...chunk.permissions],
    oversized: chunk.oversized,
    overlap: chunk.overlap,
    sourceBlockIds: [...chunk.sourceBlockIds],
    rowStart: chunk.rowRange?.start ?? null,
    rowEnd: chunk.rowRange?.end ?? null,
    imageHandle: chunk.imageHandle ?? null,
  };
}

export function fromChunkRow(row: ChunkRow): Chunk {
  return Object.freeze({
    id: row.id,
    documentId: row.documentId,
    type: row.type,
    text: row.text,
    tokenEstimate: row.tokenEstimate,
    page: row.page,
    pages: row.pages,
    section: row.sectionPath.join(" > "),
    sectionPath: row.sectionPath,
    permissions: row.permissions,
    orderIndex: row.orderIndex,
    oversized: row.oversized,
    overlap: row.overlap,
    sourceBlockIds: row.sourceBlockIds,
    ...(row.rowStart !== null && row.rowEnd !== null
      ? { rowRange: { start: row.rowStart, end: row.rowEnd } }
      : {}),
    ...(row.imageHandle !== null ? { imageHandle: row.imageHandle } : {}),
  });
}
