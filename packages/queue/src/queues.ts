import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData, EmbedJobData, CancelJobData } from "@chunkwise/types";

export const QUEUE_NAMES = {
  INGEST: "chunkwise-ingest",
  EMBED: "chunkwise-embed",
  CANCEL: "chunkwise-cancel",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export interface QueueConfig {
  connection: ConnectionOptions;
}

/** One embed job per document; a re-enqueue while one is waiting is a no-op. */
export function embedJobId(documentId: string): string {
  return `embed-${documentId}`;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, defaultOpts);

  const embedQueue = new Queue<EmbedJobData>(QUEUE_NAMES.EMBED, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 1, // the provider retries; claimed chunks are never re-sent
      // frees the job id so a re-ingested document can be enqueued again
      removeOnComplete: true,
      removeOnFail: true,
    },
  });

  const cancelQueue = new Queue<CancelJobData>(QUEUE_NAMES.CANCEL, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      priority: 1,
    },
  });

  return { ingestQueue, embedQueue, cancelQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all([queues.ingestQueue.close(), queues.embedQueue.close(), queues.cancelQueue.close()]);
}
