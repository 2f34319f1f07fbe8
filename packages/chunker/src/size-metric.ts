import type { SizeMetric, SizeMetricName } from "@chunkwise/types";

// Rough estimate: ~4 chars per token for English text
const APPROX_CHARS_PER_TOKEN = 4;

export const CHARACTER_METRIC: SizeMetric = {
  name: "characters",
  measure: (text) => text.length,
  charsFor: (units) => Math.max(0, Math.floor(units)),
};

export const TOKEN_METRIC: SizeMetric = {
  name: "tokens",
  measure: (text) => Math.ceil(text.length / APPROX_CHARS_PER_TOKEN),
  charsFor: (units) => Math.max(0, Math.floor(units)) * APPROX_CHARS_PER_TOKEN,
};

export function resolveSizeMetric(metric: SizeMetricName | SizeMetric): SizeMetric {
  if (typeof metric !== "string") {
    return metric;
  }

  switch (metric) {
    case "characters":
      return CHARACTER_METRIC;
    case "tokens":
      return TOKEN_METRIC;
    default:
      throw new Error(`Unknown size metric: ${String(metric)}`);
  }
}
