import type { SplitLevel, SplitLevelName } from "@chunkwise/types";

/**
 * Separator patterns per split level. The matched separator stays attached to
 * the segment before it, so the segments always concatenate back to the input.
 */
const SEPARATOR_PATTERNS: Record<Exclude<SplitLevelName, "character">, RegExp> = {
  paragraph: /\n[ \t]*\n\s*/g,
  line: /\r?\n/g,
  sentence: /[.!?]+["')\]]*\s+/g,
  word: /\s+/g,
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function splitAfter(text: string, pattern: RegExp): string[] {
  const parts: string[] = [];
  let last = 0;

  for (const match of text.matchAll(pattern)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > last && end < text.length) {
      parts.push(text.slice(last, end));
      last = end;
    }
  }

  parts.push(text.slice(last));
  return parts;
}

/**
 * Split `text` at one level of the cascade.
 * Returns `null` for the terminal `character` level, which is a hard cut
 * rather than a separator.
 */
export function splitAtLevel(text: string, level: SplitLevel): string[] | null {
  if (typeof level !== "string") {
    return splitAfter(text, new RegExp(escapeRegExp(level.literal), "g"));
  }

  if (level === "character") {
    return null;
  }

  return splitAfter(text, SEPARATOR_PATTERNS[level]);
}

export function describeLevel(level: SplitLevel): string {
  return typeof level === "string" ? level : `literal(${JSON.stringify(level.literal)})`;
}
