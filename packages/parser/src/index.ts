export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { BlockReader, parsePipeRow } from "./markdown-blocks.js";
export { getParser, isSupportedPath, mimeTypeFromPath } from "./factory.js";
