/**
 * Qdrant vector storage for Fathom
 *
 * Optional backend; requires a running Qdrant server.
 * Qdrant point ids must be UUIDs or integers, so each fingerprint is mapped
 * onto a UUID and the fingerprint itself travels in the payload.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import type { EmbeddingVector } from '../embeddings/types.js';
import {
  type VectorStorage,
  type VectorRecord,
  type VectorMatch,
  type CollectionHandle,
  SnippetMetadataSchema,
  VectorStorageError,
  VectorStorageErrorCode,
} from './vector-storage.js';

/**
 * Qdrant connection configuration
 */
export interface QdrantConfig {
  /** Qdrant server URL */
  url: string;
  /** API key (optional, for cloud deployments) */
  apiKey?: string;
}

const PointPayloadSchema = SnippetMetadataSchema.extend({
  fingerprint: z.string(),
  document: z.string(),
});

const SCROLL_PAGE_SIZE = 256;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a hex fingerprint onto a UUID-shaped point id
 */
export function fingerprintToPointId(fingerprint: string): string {
  const hex = fingerprint.toLowerCase().replace(/[^0-9a-f]/g, '').padEnd(32, '0').slice(0, 32);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

/**
 * Qdrant vector store
 */
export class QdrantStorage implements VectorStorage {
  private readonly client: QdrantClient;
  private initialized = false;

  constructor(config: QdrantConfig) {
    if (!config.url) {
      throw new VectorStorageError('Qdrant URL is required', VectorStorageErrorCode.INVALID_CONFIG);
    }

    // Version is checked by initialize(), not on construction
    const clientConfig: { url: string; apiKey?: string; checkCompatibility: boolean } = {
      url: config.url,
      checkCompatibility: false,
    };
    if (config.apiKey) {
      clientConfig.apiKey = config.apiKey;
    }
    this.client = new QdrantClient(clientConfig);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      await this.client.getCollections();
      this.initialized = true;
    } catch (error) {
      throw new VectorStorageError(
        `Failed to connect to Qdrant: ${errorMessage(error)}`,
        VectorStorageErrorCode.CONNECTION_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  isReady(): boolean {
    return this.initialized;
  }

  private assertReady(): void {
    if (!this.initialized) {
      throw new VectorStorageError('Storage not initialized', VectorStorageErrorCode.NOT_INITIALIZED);
    }
  }

  async getCollection(name: string): Promise<CollectionHandle | null> {
    this.assertReady();

    try {
      const collections = await this.client.getCollections();
      if (!collections.collections.some((c) => c.name === name)) {
        return null;
      }

      const info = await this.client.getCollection(name);
      const vectors = info.config.params.vectors;
      if (vectors !== undefined && 'size' in vectors && typeof vectors.size === 'number') {
        return { name, dimensions: vectors.size };
      }
      throw new VectorStorageError(
        `Collection ${name} has no single unnamed vector`,
        VectorStorageErrorCode.COLLECTION_ERROR
      );
    } catch (error) {
      if (error instanceof VectorStorageError) throw error;
      throw new VectorStorageError(
        `Failed to read collection ${name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.COLLECTION_ERROR,
        error instanceof Error ? error : undefined
      );
    }
  }

  async getOrCreateCollection(name: string, dimensions: number): Promise<CollectionHandle> {
    const existing = await this.getCollection(name);
    if (existing !== null) {
      if (existing.dimensions !== dimensions) {
        throw new VectorStorageError(
          `Collection ${name} holds ${existing.dimensions}-dimensional vectors, not ${dimensions}`,
          VectorStorageErrorCode.DIMENSION_MISMATCH
        );
      }
      return existing;
    }

    try {
      await this.client.createCollection(name, {
        vectors: { size: dimensions, distance: 'Cosine' },
      });
      return { name, dimensions };
    } catch (error) {
      throw new VectorStorageError(
        `Failed to create collection ${name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.COLLECTION_ERROR,
        error instanceof Error ? error : undefined
      );
    }
  }

  async upsert(handle: CollectionHandle, records: VectorRecord[]): Promise<void> {
    this.assertReady();
    if (records.length === 0) return;

    for (const record of records) {
      if (record.vector.length !== handle.dimensions) {
        throw new VectorStorageError(
          `Record ${record.id} has ${record.vector.length} dimensions, collection ${handle.name} expects ${handle.dimensions}`,
          VectorStorageErrorCode.DIMENSION_MISMATCH
        );
      }
    }

    try {
      await this.client.upsert(handle.name, {
        wait: true,
        points: records.map((record) => ({
          id: fingerprintToPointId(record.id),
          vector: record.vector,
          payload: { ...record.metadata, fingerprint: record.id, document: record.document },
        })),
      });
    } catch (error) {
      throw new VectorStorageError(
        `Failed to upsert into ${handle.name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.UPSERT_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  async query(
    handle: CollectionHandle,
    vector: EmbeddingVector,
    topK: number
  ): Promise<VectorMatch[]> {
    this.assertReady();

    try {
      const results = await this.client.search(handle.name, {
        vector,
        limit: topK,
        with_payload: true,
      });

      const matches: VectorMatch[] = [];
      for (const result of results) {
        const parsed = PointPayloadSchema.safeParse(result.payload);
        if (!parsed.success) continue;
        const { fingerprint, document, ...metadata } = parsed.data;
        matches.push({ id: fingerprint, document, metadata, distance: 1 - result.score });
      }
      return matches.sort((a, b) => a.distance - b.distance);
    } catch (error) {
      throw new VectorStorageError(
        `Search in ${handle.name} failed: ${errorMessage(error)}`,
        VectorStorageErrorCode.SEARCH_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  async listIds(handle: CollectionHandle): Promise<string[]> {
    this.assertReady();

    try {
      const ids: string[] = [];
      let offset: string | number | undefined;
      do {
        const page = await this.client.scroll(handle.name, {
          limit: SCROLL_PAGE_SIZE,
          with_payload: ['fingerprint'],
          with_vector: false,
          ...(offset !== undefined ? { offset } : {}),
        });
        for (const point of page.points) {
          const fingerprint = point.payload?.['fingerprint'];
          if (typeof fingerprint === 'string') ids.push(fingerprint);
        }
        const next = page.next_page_offset;
        offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
      } while (offset !== undefined);
      return ids.sort();
    } catch (error) {
      throw new VectorStorageError(
        `Failed to list ids in ${handle.name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.SEARCH_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  async deleteIds(handle: CollectionHandle, ids: string[]): Promise<number> {
    this.assertReady();
    if (ids.length === 0) return 0;

    try {
      const pointIds = ids.map(fingerprintToPointId);
      const existing = await this.client.retrieve(handle.name, {
        ids: pointIds,
        with_payload: false,
        with_vector: false,
      });
      await this.client.delete(handle.name, { wait: true, points: pointIds });
      return existing.length;
    } catch (error) {
      throw new VectorStorageError(
        `Failed to delete from ${handle.name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.DELETE_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  async dropCollection(name: string): Promise<boolean> {
    const existing = await this.getCollection(name);
    if (existing === null) return false;

    try {
      await this.client.deleteCollection(name);
      return true;
    } catch (error) {
      throw new VectorStorageError(
        `Failed to drop collection ${name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.COLLECTION_ERROR,
        error instanceof Error ? error : undefined
      );
    }
  }

  async count(handle: CollectionHandle): Promise<number> {
    this.assertReady();

    try {
      const result = await this.client.count(handle.name, { exact: true });
      return result.count;
    } catch (error) {
      throw new VectorStorageError(
        `Failed to count ${handle.name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.COLLECTION_ERROR,
        error instanceof Error ? error : undefined
      );
    }
  }

  async close(): Promise<void> {
    // QdrantClient holds no connection to close
    this.initialized = false;
  }
}
