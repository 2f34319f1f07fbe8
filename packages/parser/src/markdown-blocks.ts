import type { ContentBlock } from "@chunkwise/types";

export interface BlockReaderOptions {
  documentId: string;
  /** Recognise headings, pipe tables and images. Plain text only splits paragraphs. */
  markdown: boolean;
}

export interface BlockReaderResult {
  blocks: ContentBlock[];
  pageCount: number;
}

const HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const TABLE_SEPARATOR = /^\|?\s*:?-{3,}:?\s*(\|\s*:?-{3,}:?\s*)*\|?\s*$/;
const IMAGE = /^!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)\s*$/;
const PAGE_BREAK = "\f";

/** Split a markdown pipe row into cells, honouring `\|` escapes. */
export function parsePipeRow(line: string): string[] {
  const inner = line.trim().replace(/^\|/, "").replace(/(?<!\\)\|$/, "");
  return inner.split(/(?<!\\)\|/).map((cell) => cell.replace(/\\\|/g, "|").trim());
}

/**
 * Line-oriented reader that turns text into content blocks.
 * Headings open a section; every later block carries the heading trail as its
 * section path. Form feeds start a new page.
 */
export class BlockReader {
  private readonly blocks: ContentBlock[] = [];
  private readonly headings: { level: number; label: string }[] = [];
  private paragraph: string[] = [];
  private page = 1;

  constructor(private readonly options: BlockReaderOptions) {}

  read(text: string): BlockReaderResult {
    const lines = text.replace(/\r\n?/g, "\n").split("\n");

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";

      if (line.includes(PAGE_BREAK)) {
        const [before = "", ...after] = line.split(PAGE_BREAK);
        this.readLine(before);
        this.flushParagraph();
        this.page += after.length;
        this.readLine(after.join(" "));
        continue;
      }

      if (this.options.markdown && this.isTableStart(lines, i)) {
        i = this.readTable(lines, i) - 1;
        continue;
      }

      this.readLine(line);
    }

    this.flushParagraph();
    return { blocks: this.blocks, pageCount: this.page };
  }

  private readLine(line: string): void {
    if (line.trim().length === 0) {
      this.flushParagraph();
      return;
    }

    if (this.options.markdown) {
      const heading = HEADING.exec(line);
      if (heading) {
        this.flushParagraph();
        this.openSection((heading[1] ?? "#").length, heading[2] ?? "");
        this.push({ kind: "heading", text: heading[2] ?? "" });
        return;
      }

      const image = IMAGE.exec(line.trim());
      if (image) {
        this.flushParagraph();
        this.push({ kind: "image", text: image[1] ?? "", image: { embeddingHandle: image[2] ?? "" } });
        return;
      }
    }

    this.paragraph.push(line);
  }

  private isTableStart(lines: readonly string[], index: number): boolean {
    const line = lines[index] ?? "";
    const next = lines[index + 1] ?? "";
    return line.trim().startsWith("|") && TABLE_SEPARATOR.test(next.trim());
  }

  /** Returns the index of the first line after the table. */
  private readTable(lines: readonly string[], start: number): number {
    this.flushParagraph();

    const header = parsePipeRow(lines[start] ?? "");
    const rows: string[][] = [];
    let i = start + 2;
    while (i < lines.length && (lines[i] ?? "").trim().startsWith("|")) {
      rows.push(parsePipeRow(lines[i] ?? ""));
      i++;
    }

    if (rows.length > 0) {
      this.push({ kind: "table", text: "", table: { header, rows } });
    } else {
      // A header with no body rows reads as a one-row table
      this.push({ kind: "table", text: "", table: { rows: [header] } });
    }
    return i;
  }

  private openSection(level: number, label: string): void {
    while (this.headings.length > 0 && (this.headings[this.headings.length - 1]?.level ?? 0) >= level) {
      this.headings.pop();
    }
    this.headings.push({ level, label });
  }

  private flushParagraph(): void {
    if (this.paragraph.length === 0) {
      return;
    }
    const text = this.paragraph.join("\n").trim();
    this.paragraph = [];
    if (text.length > 0) {
      this.push({ kind: "paragraph", text });
    }
  }

  private push(
    block:
      | { kind: "paragraph"; text: string }
      | { kind: "heading"; text: string }
      | { kind: "table"; text: string; table: { header?: string[]; rows: string[][] } }
      | { kind: "image"; text: string; image: { embeddingHandle: string } },
  ): void {
    this.blocks.push({
      ...block,
      id: `b${String(this.blocks.length)}`,
      documentId: this.options.documentId,
      page: this.page,
      sectionPath: this.headings.map((h) => h.label),
      permissions: [],
    });
  }
}
