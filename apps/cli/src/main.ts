#!/usr/bin/env node
import { parseEnv } from "@chunkwise/config";
import type { RetrievalDependencies } from "@chunkwise/core";
import { ResilientEmbeddingProvider, createEmbeddingProvider } from "@chunkwise/embeddings";
import { createLogger } from "@chunkwise/logger";
import { closeQueues, createQueues, parseRedisConnection } from "@chunkwise/queue";
import type { Queues } from "@chunkwise/queue";
import { createVectorStore } from "@chunkwise/vector-store";
import { createProgram } from "./program.js";
import type { CliServices } from "./services.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({
    level: config.logLevel,
    service: "cli",
    pretty: config.nodeEnv === "development",
  });

  let queues: Queues | undefined;
  const getQueues = (): Queues =>
    (queues ??= createQueues({ connection: parseRedisConnection(config.redis.url) }));

  let embeddingProvider: ResilientEmbeddingProvider | undefined;
  let retrieval: RetrievalDependencies | undefined;

  const services: CliServices = {
    logger,
    enqueueIngest: async (jobs) => {
      await getQueues().ingestQueue.addBulk(jobs.map((data) => ({ name: "ingest", data })));
    },
    enqueueCancel: async (job) => {
      await getQueues().cancelQueue.add("cancel", job);
    },
    retrieval: () => {
      if (!retrieval) {
        embeddingProvider = new ResilientEmbeddingProvider(
          createEmbeddingProvider(config.embedding),
          { logger },
        );
        retrieval = {
          embeddingProvider,
          vectorStore: createVectorStore({
            type: "qdrant",
            qdrantUrl: config.qdrant.url,
            qdrantApiKey: config.qdrant.apiKey,
          }),
          collectionName: config.qdrant.collection,
        };
      }
      return retrieval;
    },
    write: (text) => {
      process.stdout.write(text);
    },
  };

  try {
    await createProgram(services).parseAsync(process.argv);
  } finally {
    if (queues) await closeQueues(queues);
    embeddingProvider?.shutdown();
  }
}

main().catch((err: unknown) => {
  createLogger({ service: "cli" }).fatal({ err }, "Fatal error");
  process.exit(1);
});
