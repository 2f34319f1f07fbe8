import { extname } from "node:path";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";

const textParser = new TextParser();

const allParsers: IParser[] = [textParser];

const EXTENSION_MIME_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".text": "text/plain",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".html": "text/html",
  ".htm": "text/html",
  ".csv": "text/csv",
};

/**
 * Select the appropriate parser based on mimeType.
 */
export function getParser(mimeType: string): IParser {
  const parser = allParsers.find((p) => p.supportedMimeTypes.includes(mimeType));

  if (!parser) {
    // Default to text parser for unknown types
    return textParser;
  }

  return parser;
}

/** Guess a MIME type from a file name, defaulting to plain text. */
export function mimeTypeFromPath(path: string): string {
  return EXTENSION_MIME_TYPES[extname(path).toLowerCase()] ?? "text/plain";
}

/** True when the file extension maps to a format the parsers read. */
export function isSupportedPath(path: string): boolean {
  return Object.hasOwn(EXTENSION_MIME_TYPES, extname(path).toLowerCase());
}
