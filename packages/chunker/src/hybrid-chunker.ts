import { randomUUID } from "node:crypto";
import type { MalformedBlockError } from "@chunkwise/errors";
import type { Logger } from "@chunkwise/logger";
import type {
  Chunk,
  ChunkingConfig,
  ChunkingWarning,
  ChunkingWarningCode,
  ChunkType,
  ContentBlock,
  DocumentInput,
  ImageBlock,
  RowRange,
  SizeMetric,
} from "@chunkwise/types";
import type { ChunkingResult, IChunker } from "./chunker.interface.js";
import { validateBlock } from "./block-validator.js";
import { resolveSizeMetric } from "./size-metric.js";
import { chunkSlide } from "./slide-chunker.js";
import { chunkTable } from "./table-chunker.js";
import { splitTextPieces } from "./text-splitter.js";

export interface HybridChunkerOptions {
  logger?: Logger;
  idGenerator?: () => string;
}

interface ChunkDraft {
  type: ChunkType;
  text: string;
  overlap: number;
  oversized: boolean;
  oversizedCode: ChunkingWarningCode;
  rowRange?: RowRange;
  imageHandle?: string;
}

interface AssemblyOptions {
  idGenerator: () => string;
  logger: Logger | undefined;
}

interface Provenance {
  blockIndex: number;
  blockIds: string[];
  sectionPath: readonly string[];
  pages: Set<number>;
  permissions: Set<string>;
}

/** Consecutive paragraph and heading blocks waiting to be merged into one chunk. */
interface PendingText extends Provenance {
  text: string;
  permissionKey: string;
}

function permissionKey(permissions: readonly string[]): string {
  return [...new Set(permissions)].sort().join("\u0000");
}

function sameSection(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

class DocumentAssembly {
  readonly chunks: Chunk[] = [];
  readonly warnings: ChunkingWarning[] = [];
  readonly errors: MalformedBlockError[] = [];
  private pending: PendingText | null = null;

  constructor(
    private readonly document: DocumentInput,
    private readonly config: ChunkingConfig,
    private readonly metric: SizeMetric,
    private readonly options: AssemblyOptions,
  ) {}

  add(block: ContentBlock, blockIndex: number): void {
    const error = validateBlock(block, blockIndex, this.document.documentId);
    if (error !== null) {
      this.errors.push(error);
      this.options.logger?.warn(
        { documentId: this.document.documentId, blockIndex, issues: error.issues },
        "Skipping malformed block",
      );
      return;
    }

    const permissions = block.permissions.length > 0 ? block.permissions : this.document.permissions;
    const provenance: Provenance = {
      blockIndex,
      blockIds: [block.id ?? `block-${String(blockIndex)}`],
      sectionPath: block.sectionPath,
      pages: new Set(block.page === null ? [] : [block.page]),
      permissions: new Set(permissions),
    };

    switch (block.kind) {
      case "paragraph":
      case "heading":
        this.addText(block.text.trim(), provenance);
        return;
      case "table":
        this.flushText();
        for (const draft of chunkTable(block, this.config, this.metric)) {
          this.emit(
            {
              type: "table",
              text: draft.text,
              overlap: 0,
              oversized: draft.oversized,
              oversizedCode: "OVERSIZED_CHUNK",
              rowRange: draft.rowRange,
            },
            provenance,
          );
        }
        return;
      case "image":
        this.flushText();
        this.emit(this.imageDraft(block), provenance);
        return;
      case "slide-section":
        this.flushText();
        for (const draft of chunkSlide(block, this.config, this.metric)) {
          this.emit({ type: "mixed", ...draft }, provenance);
        }
        return;
      default: {
        const unknownKind: never = block;
        throw new Error(`Unknown block kind: ${String(unknownKind)}`);
      }
    }
  }

  finish(): ChunkingResult {
    this.flushText();
    return {
      documentId: this.document.documentId,
      chunks: this.chunks,
      warnings: this.warnings,
      errors: this.errors,
    };
  }

  private addText(text: string, provenance: Provenance): void {
    const key = permissionKey([...provenance.permissions]);
    const pending = this.pending;

    if (pending !== null && this.accepts(pending, text, provenance, key)) {
      pending.text = `${pending.text}\n\n${text}`;
      pending.blockIds.push(...provenance.blockIds);
      provenance.pages.forEach((page) => pending.pages.add(page));
      provenance.permissions.forEach((tag) => pending.permissions.add(tag));
      return;
    }

    this.flushText();
    this.pending = { ...provenance, text, permissionKey: key };
  }

  private accepts(pending: PendingText, text: string, provenance: Provenance, key: string): boolean {
    if (!sameSection(pending.sectionPath, provenance.sectionPath)) {
      return false;
    }
    if (this.config.permissionMode === "isolate" && pending.permissionKey !== key) {
      return false;
    }
    return this.metric.measure(`${pending.text}\n\n${text}`) <= this.config.maxChunkSize;
  }

  private flushText(): void {
    const pending = this.pending;
    if (pending === null) {
      return;
    }
    this.pending = null;

    for (const piece of splitTextPieces(pending.text, this.config)) {
      this.emit(
        {
          type: "paragraph",
          text: piece.text,
          overlap: piece.overlap,
          oversized: piece.oversized,
          oversizedCode: "UNSPLITTABLE_TEXT",
        },
        pending,
      );
    }
  }

  private imageDraft(block: ImageBlock): ChunkDraft {
    const text = block.text.trim();
    return {
      type: "image",
      text,
      overlap: 0,
      oversized: this.metric.measure(text) > this.config.maxChunkSize,
      oversizedCode: "OVERSIZED_CHUNK",
      ...(block.image.embeddingHandle !== undefined
        ? { imageHandle: block.image.embeddingHandle }
        : {}),
    };
  }

  private emit(draft: ChunkDraft, provenance: Provenance): void {
    const orderIndex = this.chunks.length;
    const pages = [...provenance.pages].sort((a, b) => a - b);
    const permissions = [...provenance.permissions].sort();

    const chunk: Chunk = Object.freeze({
      id: this.options.idGenerator(),
      documentId: this.document.documentId,
      type: draft.type,
      text: draft.text,
      tokenEstimate: this.metric.measure(draft.text),
      page: pages[0] ?? null,
      pages: Object.freeze(pages),
      section: provenance.sectionPath.join(" > "),
      sectionPath: Object.freeze([...provenance.sectionPath]),
      permissions: Object.freeze(permissions),
      orderIndex,
      oversized: draft.oversized,
      overlap: draft.overlap,
      sourceBlockIds: Object.freeze([...provenance.blockIds]),
      ...(draft.rowRange !== undefined ? { rowRange: Object.freeze({ ...draft.rowRange }) } : {}),
      ...(draft.imageHandle !== undefined ? { imageHandle: draft.imageHandle } : {}),
    });
    this.chunks.push(chunk);

    if (draft.oversized) {
      const size = this.metric.measure(draft.text);
      const message = `${draft.type} chunk ${String(orderIndex)} measures ${String(size)} ${this.metric.name}, over the budget of ${String(this.config.maxChunkSize)}`;
      this.warnings.push({
        code: draft.oversizedCode,
        message,
        blockIndex: provenance.blockIndex,
        orderIndex,
      });
      this.options.logger?.warn(
        {
          documentId: this.document.documentId,
          orderIndex,
          blockIndex: provenance.blockIndex,
          code: draft.oversizedCode,
        },
        message,
      );
    }
  }
}

/**
 * Structure-aware chunking of a parsed document.
 *
 * Paragraph and heading blocks in the same section are packed together up to
 * the budget and split recursively when they overflow. Tables are split on row
 * boundaries, images stay atomic and slides keep their title with every piece.
 * Malformed blocks are recorded in `errors` and skipped.
 */
export class HybridChunker implements IChunker {
  readonly strategy = "hybrid";
  private readonly idGenerator: () => string;
  private readonly logger: Logger | undefined;

  constructor(options: HybridChunkerOptions = {}) {
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.logger = options.logger;
  }

  chunk(document: DocumentInput, config: ChunkingConfig): ChunkingResult {
    const assembly = new DocumentAssembly(document, config, resolveSizeMetric(config.sizeMetric), {
      idGenerator: this.idGenerator,
      logger: this.logger,
    });

    document.blocks.forEach((block, index) => assembly.add(block, index));
    const result = assembly.finish();

    this.logger?.debug(
      {
        documentId: document.documentId,
        chunkCount: result.chunks.length,
        warningCount: result.warnings.length,
        errorCount: result.errors.length,
      },
      "Document chunked",
    );

    return result;
  }
}

export function chunkDocument(
  document: DocumentInput,
  config: ChunkingConfig,
  options?: HybridChunkerOptions,
): ChunkingResult {
  return new HybridChunker(options).chunk(document, config);
}
