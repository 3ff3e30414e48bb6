/**
 * VectorStorage interface for Fathom
 *
 * Provides an abstraction layer over vector storage backends. Each project
 * owns one named collection.
 * Implementations: SqliteVecStorage (default), QdrantStorage (optional)
 */

import { z } from 'zod';
import type { EmbeddingVector } from '../embeddings/types.js';

/**
 * Metadata stored with every snippet vector
 */
export const SnippetMetadataSchema = z.object({
  filePath: z.string(),
  className: z.string().nullable(),
  methodName: z.string(),
  parameters: z.string().nullable(),
  returnType: z.string().nullable(),
  startLine: z.number().int(),
  endLine: z.number().int(),
});

export type SnippetMetadata = z.infer<typeof SnippetMetadataSchema>;

/**
 * Record to upsert into a collection
 */
export interface VectorRecord {
  /** Snippet fingerprint */
  id: string;
  vector: EmbeddingVector;
  /** Code body */
  document: string;
  metadata: SnippetMetadata;
}

/**
 * Match returned from a similarity query
 */
export interface VectorMatch {
  id: string;
  document: string;
  metadata: SnippetMetadata;
  /** Cosine distance; lower is closer */
  distance: number;
}

/**
 * Opened collection
 */
export interface CollectionHandle {
  readonly name: string;
  readonly dimensions: number;
}

/**
 * Vector storage error codes
 */
export enum VectorStorageErrorCode {
  /** Connection failed */
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  /** Collection/table operation failed */
  COLLECTION_ERROR = 'COLLECTION_ERROR',
  /** Collection exists with different dimensions */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  /** Upsert operation failed */
  UPSERT_FAILED = 'UPSERT_FAILED',
  /** Search operation failed */
  SEARCH_FAILED = 'SEARCH_FAILED',
  /** Delete operation failed */
  DELETE_FAILED = 'DELETE_FAILED',
  /** Invalid configuration */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** Not initialized */
  NOT_INITIALIZED = 'NOT_INITIALIZED',
}

/**
 * Base error class for vector storage errors
 */
export class VectorStorageError extends Error {
  constructor(
    message: string,
    public readonly code: VectorStorageErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'VectorStorageError';
  }
}

/**
 * Vector storage interface
 */
export interface VectorStorage {
  /**
   * Open the backend. Safe to call more than once.
   */
  initialize(): Promise<void>;

  isReady(): boolean;

  /**
   * Open a collection, creating it with the given dimensions if absent
   */
  getOrCreateCollection(name: string, dimensions: number): Promise<CollectionHandle>;

  /**
   * Open an existing collection, or null when it was never created
   */
  getCollection(name: string): Promise<CollectionHandle | null>;

  /**
   * Insert or replace records by id
   */
  upsert(handle: CollectionHandle, records: VectorRecord[]): Promise<void>;

  /**
   * Nearest records, ascending by distance
   */
  query(handle: CollectionHandle, vector: EmbeddingVector, topK: number): Promise<VectorMatch[]>;

  /**
   * Every record id in the collection
   */
  listIds(handle: CollectionHandle): Promise<string[]>;

  /**
   * Delete records by id
   *
   * @returns Number of records deleted
   */
  deleteIds(handle: CollectionHandle, ids: string[]): Promise<number>;

  /**
   * Drop a collection with all its records
   *
   * @returns Whether the collection existed
   */
  dropCollection(name: string): Promise<boolean>;

  count(handle: CollectionHandle): Promise<number>;

  close(): Promise<void>;
}
