import type {
  ChunkingConfig,
  ChunkingWarningCode,
  SizeMetric,
  SlideSectionBlock,
} from "@chunkwise/types";
import { splitTextPieces } from "./text-splitter.js";

export interface SlideChunkDraft {
  text: string;
  overlap: number;
  oversized: boolean;
  /** Why the draft is over budget: the slide as a whole, or body text the splitter could not cut. */
  oversizedCode: ChunkingWarningCode;
}

/** Title line followed by one `[image]` line per OCR text on the slide. */
export function slideHeader(block: SlideSectionBlock): string {
  const lines: string[] = [];
  const title = block.slide?.title?.trim() ?? "";
  if (title.length > 0) {
    lines.push(title);
  }
  for (const imageText of block.slide?.imageText ?? []) {
    const trimmed = imageText.trim();
    if (trimmed.length > 0) {
      lines.push(`[image] ${trimmed}`);
    }
  }
  return lines.join("\n");
}

export function serializeSlide(block: SlideSectionBlock): string {
  return [slideHeader(block), block.text.trim()].filter((part) => part.length > 0).join("\n\n");
}

export function chunkSlide(
  block: SlideSectionBlock,
  config: ChunkingConfig,
  metric: SizeMetric,
): SlideChunkDraft[] {
  const whole = serializeSlide(block);
  if (whole.length === 0) {
    return [];
  }
  if (metric.measure(whole) <= config.maxChunkSize) {
    return [{ text: whole, overlap: 0, oversized: false, oversizedCode: "OVERSIZED_CHUNK" }];
  }

  const header = slideHeader(block);
  const body = block.text.trim();
  if (config.slideStrategy === "one-per-slide" || body.length === 0) {
    return [{ text: whole, overlap: 0, oversized: true, oversizedCode: "OVERSIZED_CHUNK" }];
  }

  const prefix = header.length > 0 ? `${header}\n\n` : "";
  const bodyBudget = config.maxChunkSize - metric.measure(prefix);

  // Header alone leaves no room for any body text
  if (bodyBudget < 1) {
    return [{ text: whole, overlap: 0, oversized: true, oversizedCode: "OVERSIZED_CHUNK" }];
  }

  const pieces = splitTextPieces(body, {
    ...config,
    maxChunkSize: bodyBudget,
    overlapSize: Math.min(config.overlapSize, bodyBudget - 1),
  });

  return pieces.map((piece) => ({
    text: prefix + piece.text,
    overlap: piece.overlap,
    oversized: piece.oversized,
    oversizedCode: "UNSPLITTABLE_TEXT",
  }));
}
