/**
 * Snippet vector index
 *
 * Binds a vector storage backend to an embedding provider and maps project
 * names onto collection names. The indexing pipeline writes through it and
 * the search router reads through it.
 */

import type { EmbeddingProvider } from '../embeddings/types.js';
import type {
  CollectionHandle,
  VectorMatch,
  VectorRecord,
  VectorStorage,
} from '../storage/vector-storage.js';
import { collectionNameFor } from '../storage/project-key.js';

/**
 * Outcome of a similarity query against a project
 */
export type VectorQueryOutcome =
  | { kind: 'ok'; matches: VectorMatch[] }
  | { kind: 'collection-not-found'; collection: string };

export class SnippetVectorIndex {
  constructor(
    private readonly storage: VectorStorage,
    private readonly embeddings: EmbeddingProvider
  ) {}

  get dimensions(): number {
    return this.embeddings.dimensions;
  }

  /**
   * Open the backend and the embedding provider; safe to call repeatedly
   */
  async ensureReady(): Promise<void> {
    if (!this.storage.isReady()) {
      await this.storage.initialize();
    }
    if (!this.embeddings.isReady()) {
      await this.embeddings.initialize();
    }
  }

  async getOrCreateCollection(projectName: string): Promise<CollectionHandle> {
    await this.ensureReady();
    return this.storage.getOrCreateCollection(
      collectionNameFor(projectName),
      this.embeddings.dimensions
    );
  }

  /**
   * Embed texts with the configured provider
   */
  async embedTexts(texts: string[]): Promise<number[][]> {
    await this.ensureReady();
    return this.embeddings.embedBatch(texts);
  }

  async upsert(handle: CollectionHandle, records: VectorRecord[]): Promise<void> {
    await this.storage.upsert(handle, records);
  }

  /**
   * Embed `queryText` and return the `topK` nearest snippets of a project
   */
  async query(projectName: string, queryText: string, topK: number): Promise<VectorQueryOutcome> {
    const collection = collectionNameFor(projectName);
    await this.ensureReady();

    const handle = await this.storage.getCollection(collection);
    if (handle === null) {
      return { kind: 'collection-not-found', collection };
    }

    const vector = await this.embeddings.embed(queryText);
    const matches = await this.storage.query(handle, vector, topK);
    return { kind: 'ok', matches };
  }

  /**
   * Delete every record whose id is not in `keepIds`
   *
   * @returns Number of records deleted
   */
  async prune(handle: CollectionHandle, keepIds: ReadonlySet<string>): Promise<number> {
    const stale = (await this.storage.listIds(handle)).filter((id) => !keepIds.has(id));
    if (stale.length === 0) return 0;
    return this.storage.deleteIds(handle, stale);
  }

  /**
   * Drop a project's collection
   *
   * @returns Whether the collection existed
   */
  async drop(projectName: string): Promise<boolean> {
    await this.ensureReady();
    return this.storage.dropCollection(collectionNameFor(projectName));
  }

  async count(projectName: string): Promise<number | null> {
    await this.ensureReady();
    const handle = await this.storage.getCollection(collectionNameFor(projectName));
    return handle === null ? null : this.storage.count(handle);
  }

  async close(): Promise<void> {
    await this.storage.close();
  }
}
