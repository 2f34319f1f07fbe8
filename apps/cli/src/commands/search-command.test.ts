import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";
import { InvalidArgumentError } from "commander";
import type { IEmbeddingProvider } from "@chunkwise/embeddings";
import { createLogger } from "@chunkwise/logger";
import type { CancelJobData, EmbeddingResult, VectorRecord } from "@chunkwise/types";
import { InMemoryVectorStore } from "@chunkwise/vector-store";
import { createProgram } from "../program.js";
import type { CliServices } from "../services.js";
import { parsePositiveInt, parseTags } from "./options.js";

const COLLECTION = "chunks";

function result(embeddings: number[][]): EmbeddingResult {
  return { embeddings, model: "fake-model", tokensUsed: 1, dimensions: 2 };
}

function record(
  id: string,
  documentId: string,
  vector: number[],
  permissions: string[],
  text: string,
  orderIndex: number,
): VectorRecord {
  return { id, documentId, vector, permissions, payload: { text, orderIndex } };
}

describe("search and cancel commands", () => {
  let output: string[];
  let enqueueCancel: Mock<(job: CancelJobData) => Promise<void>>;
  let services: CliServices;

  beforeEach(async () => {
    const vectorStore = new InMemoryVectorStore();
    await vectorStore.ensureCollection(COLLECTION, 2);
    await vectorStore.upsert(COLLECTION, [
      record("a", "doc-1", [1, 0], ["staff"], "Alpha.", 0),
      record("b", "doc-1", [0, 1], ["staff"], "Beta.", 1),
      record("c", "doc-2", [1, 0], ["legal"], "Clause.", 0),
    ]);

    const embeddingProvider: IEmbeddingProvider = {
      name: "fake",
      dimensions: 2,
      embed: vi.fn(async () => result([[1, 0]])),
      batchEmbed: vi.fn(async (texts: string[]) => result(texts.map(() => [1, 0]))),
      healthCheck: vi.fn(async () => true),
    };

    output = [];
    enqueueCancel = vi.fn(async () => undefined);
    services = {
      logger: createLogger({ level: "silent" }),
      enqueueIngest: vi.fn(async () => undefined),
      enqueueCancel,
      retrieval: () => ({ embeddingProvider, vectorStore, collectionName: COLLECTION }),
      write: (text) => {
        output.push(text);
      },
    };
  });

  it("prints the permitted chunks in reading order", async () => {
    await createProgram(services).parseAsync(["search", "alpha", "-p", "staff"], { from: "user" });

    expect(output).toEqual(["[1] (Source: doc-1)\nAlpha.\n\n[2] (Source: doc-1)\nBeta.\n"]);
  });

  it("honours top-k and document filters", async () => {
    await createProgram(services).parseAsync(["search", "alpha", "-p", "staff", "-k", "1"], {
      from: "user",
    });
    await createProgram(services).parseAsync(
      ["search", "clause", "-p", "staff,legal", "-d", "doc-2"],
      { from: "user" },
    );

    expect(output).toEqual(["[1] (Source: doc-1)\nAlpha.\n", "[1] (Source: doc-2)\nClause.\n"]);
  });

  it("says so when nothing matches", async () => {
    await createProgram(services).parseAsync(["search", "alpha", "-p", "finance"], { from: "user" });

    expect(output).toEqual(["No matching chunks.\n"]);
  });

  it("queues a cancel job with its reason", async () => {
    await createProgram(services).parseAsync(["cancel", "doc-1", "-r", "withdrawn"], {
      from: "user",
    });

    expect(enqueueCancel).toHaveBeenCalledWith({
      type: "cancel",
      documentId: "doc-1",
      reason: "withdrawn",
    });
  });

  it("rejects empty tag lists and non-positive counts", () => {
    expect(parseTags(" legal , staff ")).toEqual(["legal", "staff"]);
    expect(() => parseTags(" , ")).toThrow(InvalidArgumentError);
    expect(parsePositiveInt("5")).toBe(5);
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("2.5")).toThrow(InvalidArgumentError);
  });
});
