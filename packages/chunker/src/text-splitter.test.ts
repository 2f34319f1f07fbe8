import { describe, it, expect } from "vitest";
import { createChunkingConfig } from "@chunkwise/config";
import type { SizeMetric } from "@chunkwise/types";
import { splitText, splitTextPieces } from "./text-splitter.js";
import { CHARACTER_METRIC, TOKEN_METRIC } from "./size-metric.js";

const WORDS = "abcd ".repeat(480);

describe("splitText", () => {
  it("returns text that fits as a single unchanged piece", () => {
    const config = createChunkingConfig({ maxChunkSize: 100 });
    expect(splitText("  short text\n", config)).toEqual(["  short text\n"]);
  });

  it("returns nothing for blank text", () => {
    const config = createChunkingConfig({ maxChunkSize: 100 });
    expect(splitText("", config)).toEqual([]);
    expect(splitText(" \n\n ", config)).toEqual([]);
  });

  it("splits a long run of words at word boundaries", () => {
    const config = createChunkingConfig({ maxChunkSize: 1000, overlapSize: 0 });

    const pieces = splitText(WORDS, config);

    expect(pieces.map((p) => p.length)).toEqual([1000, 1000, 400]);
    expect(pieces.join("")).toBe(WORDS);
    pieces.forEach((piece) => {
      expect(piece.endsWith(" ")).toBe(true);
    });
  });

  it("prefers paragraph boundaries over smaller separators", () => {
    const config = createChunkingConfig({ maxChunkSize: 100 });
    const text = `${"A".repeat(60)}\n\n${"B".repeat(60)}`;

    expect(splitText(text, config)).toEqual([`${"A".repeat(60)}\n\n`, "B".repeat(60)]);
  });

  it("falls back to sentence boundaries", () => {
    const config = createChunkingConfig({ maxChunkSize: 10 });

    expect(splitText("One. Two. Three.", config)).toEqual(["One. Two. ", "Three."]);
  });

  it("splits on literal separators", () => {
    const config = createChunkingConfig({
      maxChunkSize: 10,
      splitPriority: [{ literal: "---" }, "character"],
    });

    expect(splitText("alpha---beta---gamma", config)).toEqual(["alpha---", "beta---", "gamma"]);
  });

  it("hard-cuts text with no separators", () => {
    const config = createChunkingConfig({ maxChunkSize: 10 });

    expect(splitText("x".repeat(25), config)).toEqual(["x".repeat(10), "x".repeat(10), "x".repeat(5)]);
  });

  it("is deterministic", () => {
    const config = createChunkingConfig({ maxChunkSize: 300, overlapSize: 30 });
    expect(splitText(WORDS, config)).toEqual(splitText(WORDS, config));
  });

  it("measures with the token metric", () => {
    const config = createChunkingConfig({ maxChunkSize: 250, sizeMetric: "tokens" });

    const pieces = splitText(WORDS, config);

    expect(pieces.map((p) => p.length)).toEqual([1000, 1000, 400]);
    pieces.forEach((piece) => {
      expect(TOKEN_METRIC.measure(piece)).toBeLessThanOrEqual(250);
    });
  });
});

describe("splitTextPieces", () => {
  it("prefixes each later piece with the text just before it", () => {
    const config = createChunkingConfig({ maxChunkSize: 1000, overlapSize: 100 });

    const pieces = splitTextPieces(WORDS, config);

    expect(pieces.map((p) => p.text.length)).toEqual([900, 1000, 700]);
    expect(pieces.map((p) => p.overlap)).toEqual([0, 100, 100]);
    expect(pieces[1]!.text.slice(0, 100)).toBe(pieces[0]!.source.slice(-100));
    expect(pieces[2]!.text.slice(0, 100)).toBe(pieces[1]!.source.slice(-100));
    expect(pieces.map((p) => p.source).join("")).toBe(WORDS);
    pieces.forEach((piece) => {
      expect(CHARACTER_METRIC.measure(piece.text)).toBeLessThanOrEqual(1000);
      expect(piece.oversized).toBe(false);
    });
  });

  it("records source offsets", () => {
    const config = createChunkingConfig({ maxChunkSize: 1000, overlapSize: 0 });

    const pieces = splitTextPieces(WORDS, config);

    expect(pieces.map((p) => [p.start, p.end])).toEqual([
      [0, 1000],
      [1000, 2000],
      [2000, 2400],
    ]);
  });

  it("takes the overlap only from the previous piece", () => {
    const config = createChunkingConfig({ maxChunkSize: 16, overlapSize: 6 });

    const pieces = splitTextPieces("aaaaaaaa\n\nbb\n\ncccccccc", config);

    expect(pieces.map((p) => p.source)).toEqual(["aaaaaaaa\n\n", "bb\n\n", "cccccccc"]);
    expect(pieces[1]!.text).toBe("aaaa\n\nbb\n\n");
    expect(pieces[2]!.text).toBe("bb\n\ncccccccc");
    expect(pieces[2]!.overlap).toBe(4);
  });

  it("keeps astral characters whole when hard-cutting", () => {
    const emoji = "\u{1F600}";
    const config = createChunkingConfig({ maxChunkSize: 5 });

    const pieces = splitText(emoji.repeat(6), config);

    expect(pieces).toEqual([emoji.repeat(2), emoji.repeat(2), emoji.repeat(2)]);
  });

  it("starts an overlap prefix on a whole character", () => {
    const emoji = "\u{1F600}";
    const config = createChunkingConfig({ maxChunkSize: 5, overlapSize: 1 });

    const pieces = splitTextPieces(emoji.repeat(6), config);

    expect(pieces.map((p) => p.text)).toEqual([emoji.repeat(2), emoji.repeat(2), emoji.repeat(2)]);
    expect(pieces.map((p) => p.overlap)).toEqual([0, 0, 0]);
  });

  it("flags text the metric cannot fit into any piece", () => {
    const heavy: SizeMetric = {
      name: "heavy",
      measure: (text) => text.length * 10,
      charsFor: (units) => Math.floor(units / 10),
    };
    const config = createChunkingConfig({
      maxChunkSize: 5,
      sizeMetric: heavy,
      splitPriority: ["character"],
    });

    const pieces = splitTextPieces("abc", config);

    expect(pieces).toHaveLength(1);
    expect(pieces[0]!.text).toBe("abc");
    expect(pieces[0]!.oversized).toBe(true);
  });
});
