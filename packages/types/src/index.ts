export type * from "./content-block.js";
export type * from "./chunk.js";
export type * from "./config.js";
export type * from "./pipeline.js";
export type * from "./job.js";
export type {
  SearchRequest,
  SearchFilter,
  ScoredChunk,
  SearchResult,
  SearchMetadata,
} from "./query.js";
export { SEARCH_FILTER_ALLOWLIST } from "./query.js";
