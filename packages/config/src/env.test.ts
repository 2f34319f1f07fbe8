import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@chunkwise/errors";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string | undefined> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    CHUNK_MAX_SIZE: "800",
    CHUNK_OVERLAP: "40",
    CHUNK_SPLIT_PRIORITY: "paragraph,line,word",
    CHUNK_TABLE_STRATEGY: "row-group",
    CHUNK_SLIDE_STRATEGY: "one-per-slide",
    CHUNK_SIZE_METRIC: "tokens",
    CHUNK_PERMISSION_MODE: "isolate",
    DATABASE_URL: "postgresql://localhost:5432/chunkwise",
    DATABASE_POOL_MAX: "4",
    REDIS_URL: "redis://localhost:6379",
    QDRANT_URL: "http://localhost:6333",
    QDRANT_COLLECTION: "articles",
    EMBEDDING_PROVIDER: "cohere",
    EMBEDDING_DIMENSIONS: "1024",
    COHERE_API_KEY: "test-cohere-key",
    COHERE_EMBED_MODEL: "embed-v4.0",
    WORKER_INGEST_CONCURRENCY: "3",
    WORKER_EMBED_CONCURRENCY: "1",
    ...overrides,
  };
}

function without(env: Record<string, string | undefined>, ...keys: string[]) {
  const copy = { ...env };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.logLevel).toBe("info");
    expect(config.chunking).toEqual({
      maxChunkSize: 800,
      overlapSize: 40,
      splitPriority: ["paragraph", "line", "word"],
      tableStrategy: "row-group",
      slideStrategy: "one-per-slide",
      sizeMetric: "tokens",
      permissionMode: "isolate",
    });
    expect(config.database).toEqual({ url: "postgresql://localhost:5432/chunkwise", poolMax: 4 });
    expect(config.redis.url).toBe("redis://localhost:6379");
    expect(config.qdrant).toEqual({
      url: "http://localhost:6333",
      apiKey: undefined,
      collection: "articles",
    });
    expect(config.embedding.provider).toBe("cohere");
    expect(config.embedding.cohereApiKey).toBe("test-cohere-key");
    expect(config.worker).toEqual({ ingestConcurrency: 3, embedConcurrency: 1 });
  });

  it("freezes the chunking configuration", () => {
    const config = parseEnv(makeValidEnv());

    expect(Object.isFrozen(config.chunking)).toBe(true);
    expect(Object.isFrozen(config.chunking.splitPriority)).toBe(true);
  });

  it("uses loader defaults when chunking variables are absent", () => {
    const env = without(
      makeValidEnv(),
      "CHUNK_MAX_SIZE",
      "CHUNK_OVERLAP",
      "CHUNK_SPLIT_PRIORITY",
      "CHUNK_TABLE_STRATEGY",
      "CHUNK_SLIDE_STRATEGY",
      "CHUNK_SIZE_METRIC",
      "CHUNK_PERMISSION_MODE",
    );

    const config = parseEnv(env);

    expect(config.chunking.maxChunkSize).toBe(1000);
    expect(config.chunking.overlapSize).toBe(20);
    expect(config.chunking.splitPriority).toEqual([
      "paragraph",
      "line",
      "sentence",
      "word",
      "character",
    ]);
    expect(config.chunking.tableStrategy).toBe("whole-table-if-fits");
    expect(config.chunking.slideStrategy).toBe("split-if-over-budget");
    expect(config.chunking.sizeMetric).toBe("characters");
    expect(config.chunking.permissionMode).toBe("union");
  });

  it("fails fast when the overlap does not fit the chunk budget", () => {
    const env = makeValidEnv({ CHUNK_MAX_SIZE: "100", CHUNK_OVERLAP: "100" });

    expect(() => parseEnv(env)).toThrow(ConfigurationError);
    expect(() => parseEnv(env)).toThrow("Invalid chunking configuration");
  });

  it("rejects an empty split priority", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SPLIT_PRIORITY: " , " }))).toThrow(
      ConfigurationError,
    );
  });

  it("rejects unknown split levels", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SPLIT_PRIORITY: "paragraph,clause" }))).toThrow(
      ConfigurationError,
    );
  });

  it("rejects a DATABASE_URL that is not postgres", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow(
      ConfigurationError,
    );
  });

  it("rejects missing REDIS_URL", () => {
    expect(() => parseEnv(without(makeValidEnv(), "REDIS_URL"))).toThrow(ConfigurationError);
  });

  it("requires COHERE_API_KEY for the cohere provider", () => {
    try {
      parseEnv(without(makeValidEnv(), "COHERE_API_KEY"));
      expect.unreachable("parseEnv should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual([
          "COHERE_API_KEY: COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
        ]);
      }
    }
  });

  it("requires BGE_M3_URL for the bge-m3 provider", () => {
    const env = without(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3" }), "COHERE_API_KEY");
    expect(() => parseEnv(env)).toThrow(ConfigurationError);

    const config = parseEnv({ ...env, BGE_M3_URL: "http://localhost:8080" });
    expect(config.embedding.provider).toBe("bge-m3");
    expect(config.embedding.bgeM3Url).toBe("http://localhost:8080");
    expect(config.embedding.cohereApiKey).toBe("");
  });
});
