import { describe, it, expect } from "vitest";
import { createChunkingConfig } from "@chunkwise/config";
import type { TableBlock } from "@chunkwise/types";
import { chunkTable, serializeRow, serializeTable } from "./table-chunker.js";
import { CHARACTER_METRIC } from "./size-metric.js";

function makeTable(rows: string[][], header?: string[], caption = ""): TableBlock {
  return {
    kind: "table",
    documentId: "doc-1",
    page: 1,
    sectionPath: ["Results"],
    permissions: [],
    text: caption,
    table: header === undefined ? { rows } : { header, rows },
  };
}

const ROWS = Array.from({ length: 50 }, () => ["r01", "x".repeat(29)]);

describe("serializeRow", () => {
  it("writes a markdown pipe row", () => {
    expect(serializeRow(["a", "b"])).toBe("| a | b |");
  });

  it("escapes pipes and flattens newlines", () => {
    expect(serializeRow(["a|b", "line\nbreak"])).toBe("| a\\|b | line break |");
  });
});

describe("serializeTable", () => {
  it("writes caption, header, separator and rows", () => {
    const table = makeTable([["1", "2"]], ["id", "value"], "Table 1");

    expect(serializeTable(table)).toBe("Table 1\n| id | value |\n| --- | --- |\n| 1 | 2 |");
  });
});

describe("chunkTable", () => {
  it("keeps a table that fits as one chunk", () => {
    const config = createChunkingConfig({ maxChunkSize: 500 });
    const table = makeTable([["1", "2"], ["3", "4"]], ["id", "value"]);

    const drafts = chunkTable(table, config, CHARACTER_METRIC);

    expect(drafts).toEqual([
      {
        text: "| id | value |\n| --- | --- |\n| 1 | 2 |\n| 3 | 4 |",
        rowRange: { start: 0, end: 1 },
        oversized: false,
      },
    ]);
  });

  it("groups rows under a repeated header", () => {
    const config = createChunkingConfig({ maxChunkSize: 500 });
    const table = makeTable(ROWS, ["id", "value"]);

    const drafts = chunkTable(table, config, CHARACTER_METRIC);

    expect(drafts.map((d) => d.rowRange)).toEqual([
      { start: 0, end: 10 },
      { start: 11, end: 21 },
      { start: 22, end: 32 },
      { start: 33, end: 43 },
      { start: 44, end: 49 },
    ]);
    drafts.forEach((draft) => {
      expect(draft.text.startsWith("| id | value |\n| --- | --- |\n")).toBe(true);
      expect(draft.text.length).toBeLessThanOrEqual(500);
      expect(draft.oversized).toBe(false);
    });
  });

  it("never splits a row across chunks", () => {
    const config = createChunkingConfig({ maxChunkSize: 500 });
    const table = makeTable(ROWS, ["id", "value"]);
    const row = serializeRow(ROWS[0]!);

    const drafts = chunkTable(table, config, CHARACTER_METRIC);
    const rowLines = drafts.flatMap((d) => d.text.split("\n").slice(2));

    expect(rowLines).toHaveLength(50);
    rowLines.forEach((line) => {
      expect(line).toBe(row);
    });
  });

  it("emits an over-budget row as its own oversized chunk", () => {
    const config = createChunkingConfig({ maxChunkSize: 60 });
    const table = makeTable([["a", "b"], ["long", "y".repeat(80)], ["c", "d"]], ["k", "v"]);

    const drafts = chunkTable(table, config, CHARACTER_METRIC);

    expect(drafts.map((d) => [d.rowRange, d.oversized])).toEqual([
      [{ start: 0, end: 0 }, false],
      [{ start: 1, end: 1 }, true],
      [{ start: 2, end: 2 }, false],
    ]);
  });

  it("groups rows even when the table fits under the row-group strategy", () => {
    const config = createChunkingConfig({ maxChunkSize: 500, tableStrategy: "row-group" });
    const table = makeTable([["1", "2"]]);

    expect(chunkTable(table, config, CHARACTER_METRIC)).toEqual([
      { text: "| 1 | 2 |", rowRange: { start: 0, end: 0 }, oversized: false },
    ]);
  });
});
