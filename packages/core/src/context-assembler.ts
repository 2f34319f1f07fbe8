import type { ScoredChunk } from "@chunkwise/types";

/**
 * Formats retrieved chunks as numbered sections in reading order: grouped by
 * document, then by `orderIndex`, regardless of score.
 */
export function assembleContext(chunks: readonly ScoredChunk[]): string {
  if (chunks.length === 0) return "";

  const ordered = [...chunks].sort(
    (a, b) => a.documentId.localeCompare(b.documentId) || a.orderIndex - b.orderIndex,
  );

  return ordered
    .map((chunk, i) => `[${String(i + 1)}] (Source: ${sourceLabel(chunk)})\n${chunk.text}`)
    .join("\n\n");
}

function sourceLabel(chunk: ScoredChunk): string {
  const section = chunk.metadata["section"];
  return typeof section === "string" && section.length > 0
    ? `${chunk.documentId}, ${section}`
    : chunk.documentId;
}
