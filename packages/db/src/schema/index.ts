export { documents, documentStatusEnum } from "./documents.js";
export { chunks, chunkTypeEnum } from "./chunks.js";
