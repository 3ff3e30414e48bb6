import type { EmbeddingVector } from '../../src/embeddings/types.js';
import {
  type CollectionHandle,
  type VectorMatch,
  type VectorRecord,
  type VectorStorage,
  VectorStorageError,
  VectorStorageErrorCode,
} from '../../src/storage/vector-storage.js';

function cosineDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  a.forEach((value, i) => {
    const other = b[i] ?? 0;
    dot += value * other;
    normA += value * value;
    normB += other * other;
  });
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 1 : 1 - dot / denominator;
}

/**
 * VectorStorage kept in plain maps, for tests
 */
export class MemoryVectorStorage implements VectorStorage {
  readonly collections = new Map<string, { dimensions: number; records: Map<string, VectorRecord> }>();
  private ready = false;
  failQueries = false;

  async initialize(): Promise<void> {
    this.ready = true;
  }

  isReady(): boolean {
    return this.ready;
  }

  async getCollection(name: string): Promise<CollectionHandle | null> {
    const collection = this.collections.get(name);
    return collection === undefined ? null : { name, dimensions: collection.dimensions };
  }

  async getOrCreateCollection(name: string, dimensions: number): Promise<CollectionHandle> {
    if (!this.collections.has(name)) {
      this.collections.set(name, { dimensions, records: new Map() });
    }
    return { name, dimensions };
  }

  private records(handle: CollectionHandle): Map<string, VectorRecord> {
    const collection = this.collections.get(handle.name);
    if (collection === undefined) {
      throw new VectorStorageError(`No collection ${handle.name}`, VectorStorageErrorCode.COLLECTION_ERROR);
    }
    return collection.records;
  }

  async upsert(handle: CollectionHandle, records: VectorRecord[]): Promise<void> {
    const stored = this.records(handle);
    for (const record of records) {
      stored.set(record.id, record);
    }
  }

  async query(handle: CollectionHandle, vector: EmbeddingVector, topK: number): Promise<VectorMatch[]> {
    if (this.failQueries) {
      throw new VectorStorageError('query failed', VectorStorageErrorCode.SEARCH_FAILED);
    }
    return [...this.records(handle).values()]
      .map((r) => ({
        id: r.id,
        document: r.document,
        metadata: r.metadata,
        distance: cosineDistance(vector, r.vector),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topK);
  }

  async listIds(handle: CollectionHandle): Promise<string[]> {
    return [...this.records(handle).keys()].sort();
  }

  async deleteIds(handle: CollectionHandle, ids: string[]): Promise<number> {
    const stored = this.records(handle);
    return ids.filter((id) => stored.delete(id)).length;
  }

  async dropCollection(name: string): Promise<boolean> {
    return this.collections.delete(name);
  }

  async count(handle: CollectionHandle): Promise<number> {
    return this.records(handle).size;
  }

  async close(): Promise<void> {
    this.ready = false;
  }
}
