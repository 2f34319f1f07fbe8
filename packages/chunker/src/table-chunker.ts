import type { ChunkingConfig, RowRange, SizeMetric, TableBlock } from "@chunkwise/types";

export interface TableChunkDraft {
  text: string;
  rowRange: RowRange;
  oversized: boolean;
}

function escapeCell(cell: string): string {
  return cell.replace(/\|/g, "\\|").replace(/\r?\n/g, " ").trim();
}

export function serializeRow(cells: readonly string[]): string {
  return `| ${cells.map(escapeCell).join(" | ")} |`;
}

/** Caption and header lines repeated at the top of every table chunk. */
export function tableHeadLines(block: TableBlock): string[] {
  const lines: string[] = [];
  const caption = block.text.trim();
  if (caption.length > 0) {
    lines.push(caption);
  }

  const header = block.table.header;
  if (header !== undefined && header.length > 0) {
    lines.push(serializeRow(header), serializeRow(header.map(() => "---")));
  }
  return lines;
}

export function serializeTable(block: TableBlock): string {
  return [...tableHeadLines(block), ...block.table.rows.map(serializeRow)].join("\n");
}

/**
 * Row-atomic table chunking. Rows are never split; the header is repeated in
 * every group. A row that alone exceeds the budget becomes its own oversized
 * chunk.
 */
export function chunkTable(
  block: TableBlock,
  config: ChunkingConfig,
  metric: SizeMetric,
): TableChunkDraft[] {
  const { rows } = block.table;
  if (rows.length === 0) {
    return [];
  }

  const budget = config.maxChunkSize;

  if (config.tableStrategy === "whole-table-if-fits") {
    const whole = serializeTable(block);
    if (metric.measure(whole) <= budget) {
      return [{ text: whole, rowRange: { start: 0, end: rows.length - 1 }, oversized: false }];
    }
  }

  const head = tableHeadLines(block).join("\n");
  const drafts: TableChunkDraft[] = [];
  let groupText = head;
  let groupStart = 0;
  let groupSize = 0;

  const flush = (end: number) => {
    drafts.push({
      text: groupText,
      rowRange: { start: groupStart, end },
      oversized: metric.measure(groupText) > budget,
    });
  };

  rows.forEach((row, index) => {
    const line = serializeRow(row);
    const candidate = groupText.length > 0 ? `${groupText}\n${line}` : line;

    if (groupSize > 0 && metric.measure(candidate) > budget) {
      flush(index - 1);
      groupText = head.length > 0 ? `${head}\n${line}` : line;
      groupStart = index;
      groupSize = 1;
      return;
    }

    groupText = candidate;
    groupSize += 1;
  });

  flush(rows.length - 1);
  return drafts;
}
