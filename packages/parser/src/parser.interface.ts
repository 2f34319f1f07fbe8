import type { ParseContext, ParsedDocument } from "@chunkwise/types";

export interface IParser {
  readonly supportedMimeTypes: string[];
  parse(input: Uint8Array | string, mimeType: string, context: ParseContext): Promise<ParsedDocument>;
}
