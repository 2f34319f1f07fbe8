import type { ChunkingConfig, SizeMetric, SplitLevel } from "@chunkwise/types";
import { splitAtLevel } from "./separators.js";
import { resolveSizeMetric } from "./size-metric.js";

export interface TextPiece {
  /** Emitted text, including any overlap prefix. */
  text: string;
  /** The slice of the input this piece covers, without overlap. */
  source: string;
  start: number;
  end: number;
  /** Size of the overlap prefix in metric units. */
  overlap: number;
  /** Set only when no level of the cascade could bring the piece under budget. */
  oversized: boolean;
}

interface Segment {
  text: string;
  oversized: boolean;
}

/**
 * Recursive splitting along a separator cascade.
 * Tries coarser levels first, merges adjacent segments greedily up to the
 * budget and descends one level for any segment that is still too large.
 */
export class RecursiveTextSplitter {
  private readonly metric: SizeMetric;

  constructor(private readonly config: ChunkingConfig) {
    this.metric = resolveSizeMetric(config.sizeMetric);
  }

  split(text: string): TextPiece[] {
    if (text.trim().length === 0) {
      return [];
    }

    const { maxChunkSize, overlapSize } = this.config;

    if (this.metric.measure(text) <= maxChunkSize) {
      return [{ text, source: text, start: 0, end: text.length, overlap: 0, oversized: false }];
    }

    // Reserve room for the overlap prefix on every piece
    const budget = maxChunkSize - overlapSize;
    const segments = this.splitRecursive(text, budget, this.config.splitPriority);
    const overlapChars = this.metric.charsFor(overlapSize);

    const pieces: TextPiece[] = [];
    let offset = 0;

    for (const segment of segments) {
      const start = offset;
      offset += segment.text.length;

      if (segment.text.trim().length === 0) {
        continue;
      }

      let prefix = "";
      const previous = pieces[pieces.length - 1];
      if (previous && overlapChars > 0 && !segment.oversized) {
        // Only the previous piece's own text, starting on a code point
        let from = Math.max(previous.start, start - overlapChars);
        if (from < start && isLowSurrogate(text.charCodeAt(from))) {
          from += 1;
        }
        prefix = text.slice(from, start);
        if (this.metric.measure(prefix + segment.text) > maxChunkSize) {
          prefix = "";
        }
      }

      pieces.push({
        text: prefix + segment.text,
        source: segment.text,
        start,
        end: offset,
        overlap: prefix.length > 0 ? this.metric.measure(prefix) : 0,
        oversized: segment.oversized,
      });
    }

    return pieces;
  }

  private splitRecursive(text: string, budget: number, levels: readonly SplitLevel[]): Segment[] {
    if (this.metric.measure(text) <= budget) {
      return [{ text, oversized: false }];
    }

    const [level, ...rest] = levels;
    if (level === undefined) {
      return this.hardCut(text, budget);
    }

    const parts = splitAtLevel(text, level);
    if (parts === null) {
      return this.hardCut(text, budget);
    }
    if (parts.length <= 1) {
      return this.splitRecursive(text, budget, rest);
    }

    const results: Segment[] = [];
    let current = "";

    for (const part of parts) {
      if (this.metric.measure(part) > budget) {
        if (current.length > 0) {
          results.push({ text: current, oversized: false });
          current = "";
        }
        results.push(...this.splitRecursive(part, budget, rest));
        continue;
      }

      const candidate = current + part;
      if (this.metric.measure(candidate) <= budget) {
        current = candidate;
      } else {
        results.push({ text: current, oversized: false });
        current = part;
      }
    }

    if (current.length > 0) {
      results.push({ text: current, oversized: false });
    }

    return results;
  }

  private hardCut(text: string, budget: number): Segment[] {
    const maxChars = this.metric.charsFor(budget);

    // The metric cannot fit even one character into the budget
    if (maxChars < 1) {
      return [{ text, oversized: true }];
    }

    const results: Segment[] = [];
    let i = 0;
    while (i < text.length) {
      let end = Math.min(text.length, i + maxChars);
      // Never cut a surrogate pair in two
      if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
        end = end - 1 > i ? end - 1 : end + 1;
      }
      const slice = text.slice(i, end);
      results.push({ text: slice, oversized: this.metric.measure(slice) > budget });
      i = end;
    }
    return results;
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

export function splitTextPieces(text: string, config: ChunkingConfig): TextPiece[] {
  return new RecursiveTextSplitter(config).split(text);
}

/** Split text into pieces that each fit `config.maxChunkSize`, overlap included. */
export function splitText(text: string, config: ChunkingConfig): string[] {
  return splitTextPieces(text, config).map((piece) => piece.text);
}
