export * from "./schema/index.js";
export { createDbClient, closeDbClient, type DbClient, type DbClientOptions } from "./client.js";
export { applySchema, getSchemaStatements } from "./migrate.js";
export { toChunkRow, fromChunkRow, type ChunkRow, type NewChunkRow } from "./chunk-mapper.js";
export type {
  ChunkRepository,
  DocumentRecord,
  DocumentRepository,
  NewDocument,
  StatusUpdate,
} from "./repositories.js";
export { DrizzleChunkRepository, DrizzleDocumentRepository } from "./drizzle-repositories.js";
export { InMemoryChunkRepository, InMemoryDocumentRepository } from "./memory-repositories.js";
