import { ValidationError } from "@chunkwise/errors";
import type { VectorRecord } from "@chunkwise/types";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { assertPermissions } from "./permissions.js";

interface Collection {
  dimensions: number | null;
  points: Map<string, VectorRecord>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * In-process vector store with exact cosine search.
 * Applies the same permission and document filters as the Qdrant adapter.
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly collections = new Map<string, Collection>();

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const collection = this.collection(collectionName);

    for (const record of records) {
      if (collection.dimensions !== null && record.vector.length !== collection.dimensions) {
        throw new ValidationError(
          `Vector for ${record.id} has ${String(record.vector.length)} dimensions, expected ${String(collection.dimensions)}`,
        );
      }
      collection.points.set(record.id, {
        ...record,
        vector: [...record.vector],
        permissions: [...record.permissions],
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    assertPermissions(params.permissions);

    const points = this.collections.get(collectionName)?.points;
    if (!points) {
      return [];
    }

    const allowed = new Set(params.permissions);
    const documentIds = params.filter?.documentIds ?? [];

    return [...points.values()]
      .filter((p) => p.permissions.some((tag) => allowed.has(tag)))
      .filter((p) => documentIds.length === 0 || documentIds.includes(p.documentId))
      .map((p) => ({
        id: p.id,
        score: cosineSimilarity(params.vector, p.vector),
        payload: { ...p.payload, documentId: p.documentId, permissions: [...p.permissions] },
      }))
      .filter((r) => params.scoreThreshold === undefined || r.score >= params.scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, params.topK);
  }

  async delete(collectionName: string, ids: string[]): Promise<void> {
    const points = this.collections.get(collectionName)?.points;
    ids.forEach((id) => points?.delete(id));
  }

  async deleteByDocument(collectionName: string, documentId: string): Promise<void> {
    const points = this.collections.get(collectionName)?.points;
    if (!points) {
      return;
    }
    for (const [id, point] of points) {
      if (point.documentId === documentId) {
        points.delete(id);
      }
    }
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const collection = this.collection(collectionName);
    collection.dimensions ??= dimensions;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of stored points, for tests and diagnostics. */
  count(collectionName: string): number {
    return this.collections.get(collectionName)?.points.size ?? 0;
  }

  private collection(name: string): Collection {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = { dimensions: null, points: new Map() };
      this.collections.set(name, collection);
    }
    return collection;
  }
}
