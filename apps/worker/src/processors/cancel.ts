import { createChildLogger } from "@chunkwise/logger";
import type { CancelJobData } from "@chunkwise/types";
import type { WorkerContext } from "../context.js";

/**
 * Cancel job processor.
 *
 * Marks the document cancelled, discards chunk records still waiting for
 * delivery and drops the queued embed job. Chunks already delivered stay in
 * the vector store.
 */
export async function processCancel(data: CancelJobData, ctx: WorkerContext): Promise<number> {
  const { documentId } = data;
  const log = createChildLogger(ctx.logger, { documentId, job: "cancel" });

  const cancelled = await ctx.documents.updateStatus(documentId, "cancelled", {
    from: ["pending", "chunked"],
    error: data.reason ?? null,
  });

  if (!cancelled) {
    log.info("Nothing to cancel");
    return 0;
  }

  const removed = await ctx.chunks.deleteUndelivered(documentId);
  await ctx.removeEmbed(documentId);

  log.info({ removed, reason: data.reason }, "Document cancelled");
  return removed;
}
