import { z } from "zod";
import { ConfigurationError } from "@chunkwise/errors";
import type { AppConfig } from "@chunkwise/types";
import { SPLIT_LEVEL_NAMES, createChunkingConfig, formatZodIssues } from "./chunking.js";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Chunking ----------
    CHUNK_MAX_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: z.string().default("20").transform(Number).pipe(z.number().int().nonnegative()),
    CHUNK_SPLIT_PRIORITY: z
      .string()
      .default(SPLIT_LEVEL_NAMES.join(","))
      .transform((val) =>
        val
          .split(",")
          .map((level) => level.trim())
          .filter((level) => level.length > 0),
      )
      .pipe(z.array(z.enum(SPLIT_LEVEL_NAMES)).min(1, "CHUNK_SPLIT_PRIORITY must not be empty")),
    CHUNK_TABLE_STRATEGY: z.enum(["row-group", "whole-table-if-fits"]).default("whole-table-if-fits"),
    CHUNK_SLIDE_STRATEGY: z
      .enum(["one-per-slide", "split-if-over-budget"])
      .default("split-if-over-budget"),
    CHUNK_SIZE_METRIC: z.enum(["characters", "tokens"]).default("characters"),
    CHUNK_PERMISSION_MODE: z.enum(["union", "isolate"]).default("union"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql:// or postgres://",
      }),
    DATABASE_POOL_MAX: positiveInt("10"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- Qdrant ----------
    QDRANT_URL: z.string().min(1, "QDRANT_URL is required"),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("chunks"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),

    // ---------- Worker ----------
    WORKER_INGEST_CONCURRENCY: positiveInt("5"),
    WORKER_EMBED_CONCURRENCY: positiveInt("2"),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ConfigurationError listing every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError("Invalid environment", formatZodIssues(result.error));
  }

  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    chunking: createChunkingConfig({
      maxChunkSize: parsed.CHUNK_MAX_SIZE,
      overlapSize: parsed.CHUNK_OVERLAP,
      splitPriority: parsed.CHUNK_SPLIT_PRIORITY,
      tableStrategy: parsed.CHUNK_TABLE_STRATEGY,
      slideStrategy: parsed.CHUNK_SLIDE_STRATEGY,
      sizeMetric: parsed.CHUNK_SIZE_METRIC,
      permissionMode: parsed.CHUNK_PERMISSION_MODE,
    }),

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_EMBED_MODEL,
      bgeM3Url: parsed.BGE_M3_URL,
    },

    worker: {
      ingestConcurrency: parsed.WORKER_INGEST_CONCURRENCY,
      embedConcurrency: parsed.WORKER_EMBED_CONCURRENCY,
    },
  };
}
