import type { ContentBlock, ParseContext, ParsedDocument } from "@chunkwise/types";
import type { IParser } from "./parser.interface.js";
import { BlockReader } from "./markdown-blocks.js";

const TEXT_MIME_TYPES = ["text/plain", "text/markdown", "text/html", "text/csv"];

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

/**
 * Plain text, markdown, HTML and CSV parser.
 * Handles text-based formats directly without external dependencies.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(
    input: Uint8Array | string,
    mimeType: string,
    context: ParseContext,
  ): Promise<ParsedDocument> {
    const text = typeof input === "string" ? input : new TextDecoder().decode(input);

    const { blocks, pageCount } =
      mimeType === "text/csv"
        ? { blocks: this.parseCsv(text, context), pageCount: 1 }
        : new BlockReader({
            documentId: context.documentId,
            markdown: mimeType !== "text/plain",
          }).read(mimeType === "text/html" ? this.htmlToMarkdown(text) : text);

    return {
      blocks,
      pageCount,
      metadata: {
        mimeType,
        charCount: text.length,
        wordCount: text.split(/\s+/).filter((w) => w.length > 0).length,
        blockCount: blocks.length,
      },
    };
  }

  private parseCsv(text: string, context: ParseContext): ContentBlock[] {
    const records = text
      .replace(/\r\n?/g, "\n")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => this.parseCsvLine(line));

    const [header, ...rows] = records;
    if (header === undefined || rows.length === 0) {
      return [];
    }

    return [
      {
        kind: "table",
        id: "b0",
        documentId: context.documentId,
        page: 1,
        sectionPath: [],
        permissions: [],
        text: "",
        table: { header, rows },
      },
    ];
  }

  private parseCsvLine(line: string): string[] {
    const cells: string[] = [];
    let current = "";
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
      const char = line.charAt(i);
      if (quoted) {
        if (char === '"' && line[i + 1] === '"') {
          current += '"';
          i++;
        } else if (char === '"') {
          quoted = false;
        } else {
          current += char;
        }
      } else if (char === '"') {
        quoted = true;
      } else if (char === ",") {
        cells.push(current.trim());
        current = "";
      } else {
        current += char;
      }
    }
    cells.push(current.trim());
    return cells;
  }

  private htmlToMarkdown(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<h([1-6])[^>]*>/gi, (_match, level: string) => `\n\n${"#".repeat(Number(level))} `)
      .replace(/<\/(h[1-6]|p|div|li|section|article)>|<br\s*\/?>/gi, "\n\n")
      .replace(/<[^>]+>/g, " ")
      .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
      .replace(/[ \t]+/g, " ")
      .replace(/ *\n */g, "\n")
      .trim();
  }
}
