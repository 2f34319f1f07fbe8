export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
  VectorFilter,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { InMemoryVectorStore, cosineSimilarity } from "./memory-adapter.js";
export { createVectorStore } from "./factory.js";
export type { VectorStoreConfig, VectorStoreType } from "./factory.js";
