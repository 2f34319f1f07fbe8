export { envSchema, parseEnv } from "./env.js";
export {
  chunkingConfigSchema,
  createChunkingConfig,
  formatZodIssues,
  DEFAULT_CHUNKING_CONFIG,
  DEFAULT_SPLIT_PRIORITY,
  SPLIT_LEVEL_NAMES,
} from "./chunking.js";
export type { ChunkingConfigInput } from "./chunking.js";
