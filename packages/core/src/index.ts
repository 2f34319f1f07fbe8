export { prepareChunks, deliverChunks, ingest } from "./ingestion-pipeline.js";
export type {
  PreparationDependencies,
  PreparedDocument,
  DeliveryDependencies,
  DeliveryOptions,
  DeliveryStatus,
  DeliveryResult,
  IngestionDependencies,
  IngestionResult,
} from "./ingestion-pipeline.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";

export { assembleContext } from "./context-assembler.js";
export { validateSearchFilter } from "./filter-validator.js";
