import { deliverChunks } from "@chunkwise/core";
import { NotFoundError } from "@chunkwise/errors";
import { createChildLogger } from "@chunkwise/logger";
import type { EmbedJobData } from "@chunkwise/types";
import type { WorkerContext } from "../context.js";

export const EMBED_BATCH_SIZE = 64;

export interface EmbedOutcome {
  status: "indexed" | "cancelled" | "skipped";
  storedCount: number;
}

/**
 * Embed job processor.
 *
 * Chunks are claimed in the delivery ledger batch by batch before they are
 * embedded, so a chunk is handed to the embedder at most once. The document
 * status is read again before every batch; a cancel stops the remaining
 * batches. A batch that fails or is aborted after its claim is not retried:
 * its points are removed, the document is marked failed and has to be
 * re-ingested.
 */
export async function processEmbed(data: EmbedJobData, ctx: WorkerContext): Promise<EmbedOutcome> {
  const { documentId } = data;
  const log = createChildLogger(ctx.logger, { documentId, job: "embed" });

  const document = await ctx.documents.findById(documentId);
  if (!document) {
    throw new NotFoundError(`Document ${documentId} not found`);
  }
  if (document.status !== "chunked") {
    log.info({ status: document.status }, "Skipping embed for document not in chunked state");
    return { status: "skipped", storedCount: 0 };
  }

  const pending = await ctx.chunks.findUndelivered(documentId);
  let storedCount = 0;

  for (let i = 0; i < pending.length; i += EMBED_BATCH_SIZE) {
    const current = await ctx.documents.findById(documentId);
    if (current?.status === "cancelled") {
      log.info({ storedCount }, "Document cancelled during delivery");
      return { status: "cancelled", storedCount };
    }

    const batch = pending.slice(i, i + EMBED_BATCH_SIZE);
    const claimed = new Set(await ctx.chunks.claim(batch.map((chunk) => chunk.id)));
    const owned = batch.filter((chunk) => claimed.has(chunk.id));

    if (owned.length < batch.length) {
      log.warn({ skipped: batch.length - owned.length }, "Chunks already claimed elsewhere");
    }

    const ownedIds = owned.map((chunk) => chunk.id);
    const markLost = async (reason: string): Promise<void> => {
      await ctx.documents.updateStatus(documentId, "failed", {
        from: ["chunked"],
        error: `${String(owned.length)} chunks claimed but not stored: ${reason}`,
      });
    };

    try {
      const result = await deliverChunks(
        documentId,
        owned,
        {
          embeddingProvider: ctx.embeddingProvider,
          vectorStore: ctx.vectorStore,
          collectionName: ctx.collectionName,
          logger: log,
        },
        { signal: ctx.signal },
      );
      if (result.status === "cancelled") {
        log.warn({ lost: owned.length, storedCount }, "Delivery aborted after claim");
        await markLost("delivery aborted");
        return { status: "cancelled", storedCount };
      }
      storedCount += result.storedCount;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.error({ err, lost: owned.length }, "Claimed chunks were not stored");
      // A write can land before its request fails; drop whatever the batch left behind
      await ctx.vectorStore.delete(ctx.collectionName, ownedIds).catch((cleanupErr: unknown) => {
        log.error({ err: cleanupErr }, "Failed to remove points of the failed batch");
      });
      await markLost(reason);
      throw err;
    }
  }

  const indexed = await ctx.documents.updateStatus(documentId, "indexed", { from: ["chunked"] });
  if (!indexed) {
    log.info({ storedCount }, "Document changed state during delivery; not marked indexed");
    return { status: "cancelled", storedCount };
  }

  log.info({ storedCount }, "Document indexed");
  return { status: "indexed", storedCount };
}
