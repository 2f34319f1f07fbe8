import { describe, it, expect, vi } from "vitest";
import { createChunkingConfig } from "@chunkwise/config";
import { MalformedBlockError } from "@chunkwise/errors";
import { createLogger } from "@chunkwise/logger";
import type {
  ContentBlock,
  DocumentInput,
  ImageBlock,
  ParagraphBlock,
  SizeMetric,
  TableBlock,
} from "@chunkwise/types";
import { HybridChunker, chunkDocument } from "./hybrid-chunker.js";

const config = createChunkingConfig({ maxChunkSize: 200 });

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `chunk-${String(next)}`;
  };
}

function paragraph(id: string, text: string, overrides: Partial<ParagraphBlock> = {}): ParagraphBlock {
  return {
    kind: "paragraph",
    id,
    documentId: "doc-1",
    page: 1,
    sectionPath: ["Intro"],
    permissions: [],
    text,
    ...overrides,
  };
}

function table(id: string, rows: string[][]): TableBlock {
  return {
    kind: "table",
    id,
    documentId: "doc-1",
    page: 2,
    sectionPath: ["Intro"],
    permissions: [],
    text: "",
    table: { header: ["k", "v"], rows },
  };
}

function image(id: string, text: string, embeddingHandle?: string): ImageBlock {
  return {
    kind: "image",
    id,
    documentId: "doc-1",
    page: 4,
    sectionPath: ["Figures"],
    permissions: [],
    text,
    image: embeddingHandle === undefined ? {} : { embeddingHandle },
  };
}

function makeDocument(blocks: ContentBlock[], permissions: string[] = ["staff"]): DocumentInput {
  return { documentId: "doc-1", permissions, blocks };
}

describe("HybridChunker", () => {
  it("has strategy 'hybrid'", () => {
    expect(new HybridChunker().strategy).toBe("hybrid");
  });

  it("returns an empty result for an empty document", () => {
    expect(chunkDocument(makeDocument([]), config)).toEqual({
      documentId: "doc-1",
      chunks: [],
      warnings: [],
      errors: [],
    });
  });

  it("merges blocks of one section and unions their permissions", () => {
    const document = makeDocument([
      paragraph("p1", "Quarterly totals.", { permissions: ["finance"] }),
      paragraph("p2", "Contract terms.", { permissions: ["legal", "finance"] }),
    ]);

    const { chunks } = chunkDocument(document, config, { idGenerator: sequentialIds() });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toEqual({
      id: "chunk-1",
      documentId: "doc-1",
      type: "paragraph",
      text: "Quarterly totals.\n\nContract terms.",
      tokenEstimate: 34,
      page: 1,
      pages: [1],
      section: "Intro",
      sectionPath: ["Intro"],
      permissions: ["finance", "legal"],
      orderIndex: 0,
      oversized: false,
      overlap: 0,
      sourceBlockIds: ["p1", "p2"],
    });
  });

  it("keeps differing permission sets apart in isolate mode", () => {
    const isolate = createChunkingConfig({ maxChunkSize: 200, permissionMode: "isolate" });
    const document = makeDocument([
      paragraph("p1", "Quarterly totals.", { permissions: ["finance"] }),
      paragraph("p2", "Contract terms.", { permissions: ["legal", "finance"] }),
      paragraph("p3", "More terms.", { permissions: ["finance", "legal"] }),
    ]);

    const { chunks } = chunkDocument(document, isolate);

    expect(chunks.map((c) => c.permissions)).toEqual([["finance"], ["finance", "legal"]]);
    expect(chunks.map((c) => c.sourceBlockIds)).toEqual([["p1"], ["p2", "p3"]]);
  });

  it("inherits document permissions for blocks that carry none", () => {
    const { chunks } = chunkDocument(makeDocument([paragraph("p1", "Hello.")], ["staff", "admin"]), config);

    expect(chunks[0]!.permissions).toEqual(["admin", "staff"]);
  });

  it("starts a new chunk when the section changes", () => {
    const document = makeDocument([
      paragraph("p0", "Intro"),
      paragraph("p1", "Body of the intro."),
      paragraph("p2", "Body of methods.", { sectionPath: ["Methods"] }),
    ]);

    const { chunks } = chunkDocument(document, config);

    expect(chunks.map((c) => c.text)).toEqual(["Intro\n\nBody of the intro.", "Body of methods."]);
    expect(chunks.map((c) => c.section)).toEqual(["Intro", "Methods"]);
  });

  it("merges a heading with the paragraphs that follow it", () => {
    const document = makeDocument([
      {
        kind: "heading",
        id: "h1",
        documentId: "doc-1",
        page: 1,
        sectionPath: ["Intro"],
        permissions: [],
        text: "Intro",
      },
      paragraph("p1", "Body."),
    ]);

    const { chunks } = chunkDocument(document, config);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]!.text).toBe("Intro\n\nBody.");
    expect(chunks[0]!.type).toBe("paragraph");
  });

  it("never merges text into a table chunk and keeps reading order", () => {
    const document = makeDocument([
      paragraph("p1", "Before the table."),
      table("t1", [["a", "1"]]),
      paragraph("p2", "After the table."),
    ]);

    const { chunks } = chunkDocument(document, config);

    expect(chunks.map((c) => [c.type, c.orderIndex, c.sourceBlockIds])).toEqual([
      ["paragraph", 0, ["p1"]],
      ["table", 1, ["t1"]],
      ["paragraph", 2, ["p2"]],
    ]);
    expect(chunks[1]!.text).toBe("| k | v |\n| --- | --- |\n| a | 1 |");
    expect(chunks[1]!.rowRange).toEqual({ start: 0, end: 0 });
  });

  it("collects the distinct pages of merged blocks", () => {
    const document = makeDocument([
      paragraph("p1", "Page two text.", { page: 2 }),
      paragraph("p2", "Page one text.", { page: 1 }),
      paragraph("p3", "More page two.", { page: 2 }),
    ]);

    const [chunk] = chunkDocument(document, config).chunks;

    expect(chunk!.page).toBe(1);
    expect(chunk!.pages).toEqual([1, 2]);
  });

  it("falls back to positional block ids", () => {
    const document = makeDocument([
      { kind: "paragraph", documentId: "doc-1", page: null, sectionPath: [], permissions: [], text: "x" },
    ]);

    const [chunk] = chunkDocument(document, config).chunks;

    expect(chunk!.sourceBlockIds).toEqual(["block-0"]);
    expect(chunk!.page).toBeNull();
    expect(chunk!.section).toBe("");
  });

  it("splits an over-budget paragraph with overlap and strictly increasing order", () => {
    const overlapping = createChunkingConfig({ maxChunkSize: 100, overlapSize: 10 });
    const document = makeDocument([paragraph("p1", "lorem ".repeat(50).trim())]);

    const { chunks } = chunkDocument(document, overlapping, { idGenerator: sequentialIds() });

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.map((c) => c.id)).toEqual(chunks.map((_, i) => `chunk-${String(i + 1)}`));
    chunks.forEach((chunk, i) => {
      expect(chunk.orderIndex).toBe(i);
      expect(chunk.text.length).toBeLessThanOrEqual(100);
      expect(chunk.overlap).toBe(i === 0 ? 0 : 10);
    });
  });

  it("emits image chunks atomically with their handle", () => {
    const small = createChunkingConfig({ maxChunkSize: 10 });
    const document = makeDocument([image("i1", "A long OCR caption", "s3://figures/1.png")]);

    const { chunks, warnings } = chunkDocument(document, small);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]!.type).toBe("image");
    expect(chunks[0]!.text).toBe("A long OCR caption");
    expect(chunks[0]!.imageHandle).toBe("s3://figures/1.png");
    expect(chunks[0]!.oversized).toBe(true);
    expect(warnings).toEqual([
      {
        code: "OVERSIZED_CHUNK",
        message: "image chunk 0 measures 18 characters, over the budget of 10",
        blockIndex: 0,
        orderIndex: 0,
      },
    ]);
  });

  it("maps slides to mixed chunks", () => {
    const document = makeDocument([
      {
        kind: "slide-section",
        id: "s1",
        documentId: "doc-1",
        page: 5,
        sectionPath: [],
        permissions: [],
        text: "Revenue grew.",
        slide: { title: "Q3" },
      },
    ]);

    const { chunks } = chunkDocument(document, config);

    expect(chunks.map((c) => [c.type, c.text])).toEqual([["mixed", "Q3\n\nRevenue grew."]]);
  });

  it("reports text no level of the cascade can fit", () => {
    const heavy: SizeMetric = {
      name: "heavy",
      measure: (text) => text.length * 10,
      charsFor: (units) => Math.floor(units / 10),
    };
    const tiny = createChunkingConfig({ maxChunkSize: 5, sizeMetric: heavy, splitPriority: ["character"] });

    const { chunks, warnings } = chunkDocument(makeDocument([paragraph("p1", "abc")]), tiny);

    expect(chunks.map((c) => [c.text, c.oversized])).toEqual([["abc", true]]);
    expect(warnings.map((w) => [w.code, w.blockIndex, w.orderIndex])).toEqual([
      ["UNSPLITTABLE_TEXT", 0, 0],
    ]);
  });

  it("returns frozen chunks", () => {
    const [chunk] = chunkDocument(makeDocument([paragraph("p1", "Hello.")]), config).chunks;

    expect(Object.isFrozen(chunk)).toBe(true);
    expect(Object.isFrozen(chunk!.permissions)).toBe(true);
  });

  describe("malformed blocks", () => {
    it("records a table without rows and keeps going", () => {
      const document = makeDocument([
        paragraph("p1", "First."),
        table("t1", []),
        paragraph("p3", "Third."),
      ]);

      const { chunks, errors } = chunkDocument(document, config);

      expect(chunks.map((c) => c.sourceBlockIds)).toEqual([["p1", "p3"]]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(MalformedBlockError);
      expect(errors[0]!.code).toBe("MALFORMED_BLOCK");
      expect(errors[0]!.block).toEqual({ blockIndex: 1, blockId: "t1", kind: "table" });
      expect(errors[0]!.issues).toEqual(["table.rows: table has no rows"]);
    });

    it("records blank paragraphs", () => {
      const { chunks, errors } = chunkDocument(makeDocument([paragraph("p1", "   ")]), config);

      expect(chunks).toEqual([]);
      expect(errors[0]!.message).toBe("Malformed paragraph block p1: text: text must not be empty");
    });

    it("records images with neither text nor handle", () => {
      const { errors } = chunkDocument(makeDocument([image("i1", "")]), config);

      expect(errors[0]!.issues).toEqual(["image has neither OCR text nor an embedding handle"]);
    });

    it("records blocks that belong to another document", () => {
      const { chunks, errors } = chunkDocument(
        makeDocument([paragraph("p1", "Stray.", { documentId: "doc-2" })]),
        config,
      );

      expect(chunks).toEqual([]);
      expect(errors[0]!.issues).toEqual(["documentId doc-2 does not match document doc-1"]);
    });

    it("records structurally invalid blocks from untyped input", () => {
      const broken: ContentBlock = JSON.parse('{"kind":"paragraph","id":"p9","text":"x"}');

      const { errors } = chunkDocument(makeDocument([broken]), config);

      expect(errors).toHaveLength(1);
      expect(errors[0]!.block.blockId).toBe("p9");
      expect(errors[0]!.issues).toContain("documentId: Required");
    });

    it("logs each skipped block", () => {
      const logger = createLogger({ level: "silent" });
      const warn = vi.spyOn(logger, "warn");

      chunkDocument(makeDocument([table("t1", [])]), config, { logger });

      expect(warn).toHaveBeenCalledWith(
        { documentId: "doc-1", blockIndex: 0, issues: ["table.rows: table has no rows"] },
        "Skipping malformed block",
      );
    });
  });
});
