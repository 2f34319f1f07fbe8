export type { IChunker, ChunkingResult } from "./chunker.interface.js";
export { HybridChunker, chunkDocument } from "./hybrid-chunker.js";
export type { HybridChunkerOptions } from "./hybrid-chunker.js";
export { RecursiveTextSplitter, splitText, splitTextPieces } from "./text-splitter.js";
export type { TextPiece } from "./text-splitter.js";
export { chunkTable, serializeRow, serializeTable } from "./table-chunker.js";
export { chunkSlide, serializeSlide, slideHeader } from "./slide-chunker.js";
export { validateBlock } from "./block-validator.js";
export { CHARACTER_METRIC, TOKEN_METRIC, resolveSizeMetric } from "./size-metric.js";
