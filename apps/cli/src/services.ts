import type { RetrievalDependencies } from "@chunkwise/core";
import type { Logger } from "@chunkwise/logger";
import type { CancelJobData, IngestJobData } from "@chunkwise/types";

/**
 * What the commands need from the outside world. `main.ts` backs these with
 * BullMQ queues, Qdrant and the configured embedder.
 */
export interface CliServices {
  logger: Logger;
  enqueueIngest(jobs: IngestJobData[]): Promise<void>;
  enqueueCancel(job: CancelJobData): Promise<void>;
  /** Built on first use; only `search` needs an embedder and a vector store. */
  retrieval(): RetrievalDependencies;
  write(text: string): void;
}
