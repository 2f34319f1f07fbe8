import { prepareChunks } from "@chunkwise/core";
import { createChildLogger } from "@chunkwise/logger";
import type { IngestJobData } from "@chunkwise/types";
import type { WorkerContext } from "../context.js";

/**
 * Ingest job processor.
 *
 * Workflow:
 * 1. Register the document (re-ingestion resets it to pending)
 * 2. Read the source and parse -> chunk
 * 3. Drop the document's old vectors and replace its chunk records
 * 4. Move the document to chunked and enqueue the embed job
 *
 * A document cancelled while it was being chunked keeps no chunk records.
 */
export async function processIngest(data: IngestJobData, ctx: WorkerContext): Promise<void> {
  const { documentId, sourcePath, mimeType, permissions } = data;
  const log = createChildLogger(ctx.logger, { documentId, job: "ingest" });

  await ctx.documents.upsert({ id: documentId, sourcePath, mimeType, permissions });

  try {
    const content = await ctx.readSource(sourcePath);
    const prepared = await prepareChunks(
      { documentId, content, mimeType, permissions },
      { chunker: ctx.chunker, config: ctx.chunking, logger: log },
    );

    for (const error of prepared.errors) {
      log.warn({ code: error.code, details: error.details }, error.message);
    }

    // Points from an earlier ingestion of this document must not stay searchable
    await ctx.vectorStore.deleteByDocument(ctx.collectionName, documentId);
    await ctx.chunks.replaceForDocument(documentId, prepared.chunks);

    const chunked = await ctx.documents.updateStatus(documentId, "chunked", {
      from: ["pending"],
      chunkCount: prepared.chunks.length,
      error: null,
    });

    if (!chunked) {
      const removed = await ctx.chunks.deleteUndelivered(documentId);
      log.info({ removed }, "Document left pending state while chunking; chunks discarded");
      return;
    }

    await ctx.enqueueEmbed({ type: "embed", documentId });
    log.info(
      { chunkCount: prepared.chunks.length, warningCount: prepared.warnings.length },
      "Document chunked",
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    await ctx.documents.updateStatus(documentId, "failed", { from: ["pending"], error: message });
    throw err;
  }
}
