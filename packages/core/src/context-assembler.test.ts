import { describe, it, expect } from "vitest";
import type { ScoredChunk } from "@chunkwise/types";
import { assembleContext } from "./context-assembler.js";

function scored(
  chunkId: string,
  documentId: string,
  orderIndex: number,
  score: number,
  metadata: Record<string, unknown> = {},
): ScoredChunk {
  return { chunkId, documentId, orderIndex, text: `text of ${chunkId}`, score, metadata };
}

describe("assembleContext", () => {
  it("returns empty string for no chunks", () => {
    expect(assembleContext([])).toBe("");
  });

  it("orders chunks by document and reading order, not score", () => {
    const result = assembleContext([
      scored("c3", "doc-b", 0, 0.99),
      scored("c2", "doc-a", 4, 0.9),
      scored("c1", "doc-a", 1, 0.5),
    ]);

    expect(result).toBe(
      [
        "[1] (Source: doc-a)\ntext of c1",
        "[2] (Source: doc-a)\ntext of c2",
        "[3] (Source: doc-b)\ntext of c3",
      ].join("\n\n"),
    );
  });

  it("labels sources with their section when present", () => {
    const result = assembleContext([scored("c1", "doc-a", 0, 1, { section: "Intro > Scope" })]);

    expect(result).toBe("[1] (Source: doc-a, Intro > Scope)\ntext of c1");
  });
});
