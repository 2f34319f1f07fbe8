export type SplitLevelName = "paragraph" | "line" | "sentence" | "word" | "character";

export interface LiteralSeparator {
  literal: string;
}

export type SplitLevel = SplitLevelName | LiteralSeparator;

export type TableStrategy = "row-group" | "whole-table-if-fits";

export type SlideStrategy = "one-per-slide" | "split-if-over-budget";

export type PermissionMode = "union" | "isolate";

export type SizeMetricName = "characters" | "tokens";

/**
 * Size accounting used for budgets, overlap and token estimates.
 * `charsFor` must return the largest character count whose measure stays
 * within `units`; the terminal hard cut relies on it.
 */
export interface SizeMetric {
  readonly name: string;
  measure(text: string): number;
  charsFor(units: number): number;
}

export interface ChunkingConfig {
  readonly maxChunkSize: number;
  readonly overlapSize: number;
  readonly splitPriority: readonly SplitLevel[];
  readonly tableStrategy: TableStrategy;
  readonly slideStrategy: SlideStrategy;
  readonly sizeMetric: SizeMetricName | SizeMetric;
  readonly permissionMode: PermissionMode;
}

export type EmbeddingProviderName = "cohere" | "bge-m3";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  chunking: ChunkingConfig;
  database: DatabaseConfig;
  redis: RedisConfig;
  qdrant: QdrantConfig;
  embedding: EmbeddingConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  dimensions: number;
  cohereApiKey: string;
  cohereModel: string;
  bgeM3Url?: string;
}

export interface WorkerConfig {
  ingestConcurrency: number;
  embedConcurrency: number;
}
