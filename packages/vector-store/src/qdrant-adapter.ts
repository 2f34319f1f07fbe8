import { QdrantClient } from "@qdrant/js-client-rest";
import { ConfigurationError } from "@chunkwise/errors";
import type { VectorRecord } from "@chunkwise/types";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { assertPermissions } from "./permissions.js";

const BATCH_SIZE = 100;

const KEYWORD_INDEXES = ["documentId", "permissions", "type"];

/** Document id and access tags live in the payload so searches can filter on them. */
function toPoint(record: VectorRecord) {
  return {
    id: record.id,
    vector: record.vector,
    payload: {
      ...record.payload,
      documentId: record.documentId,
      permissions: [...record.permissions],
    },
  };
}

export class QdrantVectorStore implements IVectorStore {
  private readonly client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      await this.client.upsert(collectionName, {
        wait: true,
        points: records.slice(i, i + BATCH_SIZE).map(toPoint),
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    assertPermissions(params.permissions);

    const documentIds = params.filter?.documentIds ?? [];
    const must = [
      { key: "permissions", match: { any: [...params.permissions] } },
      ...(documentIds.length > 0 ? [{ key: "documentId", match: { any: documentIds } }] : []),
    ];

    const results = await this.client.search(collectionName, {
      vector: params.vector,
      limit: params.topK,
      score_threshold: params.scoreThreshold,
      filter: { must },
      with_payload: true,
    });

    return results.map((r) => ({
      id: typeof r.id === "string" ? r.id : String(r.id),
      score: r.score,
      payload: r.payload ?? {},
    }));
  }

  async delete(collectionName: string, ids: string[]): Promise<void> {
    await this.client.delete(collectionName, {
      points: ids,
    });
  }

  async deleteByDocument(collectionName: string, documentId: string): Promise<void> {
    await this.client.delete(collectionName, {
      filter: { must: [{ key: "documentId", match: { value: documentId } }] },
    });
  }

  /**
   * Create the collection with keyword indexes on the filtered payload fields.
   * An existing collection must have been created with the same vector size.
   */
  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const { exists } = await this.client.collectionExists(collectionName);

    if (exists) {
      const info = await this.client.getCollection(collectionName);
      const vectors = info.config.params.vectors;
      const size = vectors && "size" in vectors ? vectors.size : undefined;
      if (typeof size === "number" && size !== dimensions) {
        throw new ConfigurationError(
          `Collection ${collectionName} stores ${String(size)}-dimensional vectors, embedder produces ${String(dimensions)}`,
          [`EMBEDDING_DIMENSIONS: expected ${String(size)}`],
        );
      }
      return;
    }

    await this.client.createCollection(collectionName, {
      vectors: { size: dimensions, distance: "Cosine" },
    });

    for (const field of KEYWORD_INDEXES) {
      await this.client.createPayloadIndex(collectionName, {
        field_name: field,
        field_schema: "keyword",
        wait: true,
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
