import { readFile } from "node:fs/promises";
import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import { HybridChunker } from "@chunkwise/chunker";
import { parseEnv } from "@chunkwise/config";
import {
  DrizzleChunkRepository,
  DrizzleDocumentRepository,
  applySchema,
  closeDbClient,
  createDbClient,
} from "@chunkwise/db";
import { ResilientEmbeddingProvider, createEmbeddingProvider } from "@chunkwise/embeddings";
import { createLogger } from "@chunkwise/logger";
import type { Logger } from "@chunkwise/logger";
import {
  QUEUE_NAMES,
  closeQueues,
  createDeadLetterQueue,
  createQueues,
  embedJobId,
  isFinalAttempt,
  parseRedisConnection,
} from "@chunkwise/queue";
import type { DeadLetterQueue } from "@chunkwise/queue";
import type { AnyJobData, CancelJobData, EmbedJobData, IngestJobData } from "@chunkwise/types";
import { createVectorStore } from "@chunkwise/vector-store";
import type { WorkerContext } from "./context.js";
import { processIngest } from "./processors/ingest.js";
import { processEmbed } from "./processors/embed.js";
import { processCancel } from "./processors/cancel.js";

const REMOVABLE_STATES = new Set(["waiting", "delayed", "prioritized"]);

function forwardFailures<T extends AnyJobData>(
  worker: Worker<T>,
  dlq: DeadLetterQueue,
  logger: Logger,
): void {
  worker.on("failed", (job, err) => {
    if (!job) return;
    logger.error(
      { queue: worker.name, jobId: job.id, documentId: job.data.documentId, err },
      "Job failed",
    );
    if (!isFinalAttempt(job.attemptsMade, job.opts.attempts)) return;

    dlq
      .add(job.name, { ...job.data, originalQueue: worker.name, failureReason: err.message })
      .catch((dlqErr: unknown) => {
        logger.error({ jobId: job.id, err: dlqErr }, "Failed to move job to dead-letter queue");
      });
  });
}

function createWorkers(
  connection: ConnectionOptions,
  ctx: WorkerContext,
  dlq: DeadLetterQueue,
  concurrency: { ingest: number; embed: number },
): Worker[] {
  const ingestWorker = new Worker<IngestJobData>(
    QUEUE_NAMES.INGEST,
    async (job) => {
      await processIngest(job.data, ctx);
    },
    { connection, concurrency: concurrency.ingest },
  );

  const embedWorker = new Worker<EmbedJobData>(
    QUEUE_NAMES.EMBED,
    async (job) => processEmbed(job.data, ctx),
    { connection, concurrency: concurrency.embed },
  );

  const cancelWorker = new Worker<CancelJobData>(
    QUEUE_NAMES.CANCEL,
    async (job) => processCancel(job.data, ctx),
    { connection, concurrency: 1 },
  );

  forwardFailures(ingestWorker, dlq, ctx.logger);
  forwardFailures(embedWorker, dlq, ctx.logger);
  forwardFailures(cancelWorker, dlq, ctx.logger);

  return [ingestWorker, embedWorker, cancelWorker];
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({
    level: config.logLevel,
    service: "worker",
    pretty: config.nodeEnv === "development",
  });
  const connection = parseRedisConnection(config.redis.url);

  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  await applySchema(db);

  const vectorStore = createVectorStore({
    type: "qdrant",
    qdrantUrl: config.qdrant.url,
    qdrantApiKey: config.qdrant.apiKey,
  });

  const embeddingProvider = new ResilientEmbeddingProvider(
    createEmbeddingProvider(config.embedding),
    { logger },
  );

  await vectorStore.ensureCollection(config.qdrant.collection, embeddingProvider.dimensions);

  const queues = createQueues({ connection });
  const shutdownController = new AbortController();

  const ctx: WorkerContext = {
    documents: new DrizzleDocumentRepository(db),
    chunks: new DrizzleChunkRepository(db),
    chunker: new HybridChunker({ logger }),
    chunking: config.chunking,
    embeddingProvider,
    vectorStore,
    collectionName: config.qdrant.collection,
    logger,
    readSource: (path) => readFile(path),
    enqueueEmbed: async (data) => {
      await queues.embedQueue.add("embed", data, { jobId: embedJobId(data.documentId) });
    },
    removeEmbed: async (documentId) => {
      const job = await queues.embedQueue.getJob(embedJobId(documentId));
      if (job && REMOVABLE_STATES.has(await job.getState())) {
        await job.remove();
      }
    },
    signal: shutdownController.signal,
  };

  const dlq = createDeadLetterQueue(connection);
  const workers = createWorkers(connection, ctx, dlq, {
    ingest: config.worker.ingestConcurrency,
    embed: config.worker.embedConcurrency,
  });

  logger.info(
    { workers: workers.length, queues: Object.values(QUEUE_NAMES) },
    "Worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    shutdownController.abort();
    await Promise.all(workers.map((w) => w.close()));
    await closeQueues(queues);
    await dlq.close();
    embeddingProvider.shutdown();
    await closeDbClient(db);
    logger.info("All workers closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  createLogger({ service: "worker" }).fatal({ err }, "Fatal error");
  process.exit(1);
});
