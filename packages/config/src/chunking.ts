import { z } from "zod";
import { ConfigurationError } from "@chunkwise/errors";
import type { ChunkingConfig, SizeMetric, SplitLevel, SplitLevelName } from "@chunkwise/types";

export const SPLIT_LEVEL_NAMES = [
  "paragraph",
  "line",
  "sentence",
  "word",
  "character",
] as const satisfies readonly SplitLevelName[];

export const DEFAULT_SPLIT_PRIORITY: readonly SplitLevel[] = SPLIT_LEVEL_NAMES;

function isSizeMetric(value: unknown): value is SizeMetric {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "measure" in value &&
    typeof value.measure === "function" &&
    "charsFor" in value &&
    typeof value.charsFor === "function"
  );
}

const splitLevelSchema = z.union([
  z.enum(SPLIT_LEVEL_NAMES),
  z.object({ literal: z.string().min(1, "literal separator must not be empty") }),
]);

/**
 * Chunking configuration, validated once per run. Every document is chunked
 * against the same frozen result.
 */
export const chunkingConfigSchema = z
  .object({
    maxChunkSize: z.number().int().positive(),
    overlapSize: z.number().int().nonnegative().default(0),
    splitPriority: z
      .array(splitLevelSchema)
      .min(1, "splitPriority must list at least one separator")
      .default(() => [...DEFAULT_SPLIT_PRIORITY]),
    tableStrategy: z.enum(["row-group", "whole-table-if-fits"]).default("whole-table-if-fits"),
    slideStrategy: z.enum(["one-per-slide", "split-if-over-budget"]).default("split-if-over-budget"),
    sizeMetric: z
      .union([
        z.enum(["characters", "tokens"]),
        z.custom<SizeMetric>(isSizeMetric, { message: "sizeMetric must implement SizeMetric" }),
      ])
      .default("characters"),
    permissionMode: z.enum(["union", "isolate"]).default("union"),
  })
  .superRefine((config, ctx) => {
    if (config.overlapSize >= config.maxChunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["overlapSize"],
        message: "overlapSize must be smaller than maxChunkSize",
      });
    }
  });

export type ChunkingConfigInput = z.input<typeof chunkingConfigSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate and freeze a chunking configuration.
 *
 * @throws ConfigurationError when any field is invalid, the split priority is
 * empty, or the overlap does not fit inside the chunk budget.
 */
export function createChunkingConfig(input: ChunkingConfigInput): ChunkingConfig {
  const result = chunkingConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigurationError("Invalid chunking configuration", formatZodIssues(result.error));
  }

  return Object.freeze({
    ...result.data,
    splitPriority: Object.freeze([...result.data.splitPriority]),
  });
}

/** Defaults of the canonical loader setup: 1000-unit chunks with a 20-unit overlap. */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = createChunkingConfig({
  maxChunkSize: 1000,
  overlapSize: 20,
});
