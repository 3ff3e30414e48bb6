/**
 * SQLite-vec vector storage for Fathom
 *
 * Default storage backend: one SQLite file, no server.
 *
 * Layout:
 * - vector_collections: one row per collection (name, dimensions)
 * - vector_documents: id, document text and JSON metadata per record
 * - vec_<collection>: one vec0 virtual table per collection for kNN search
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
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

export interface SqliteVecConfig {
  /** Path to the SQLite database file, or ':memory:' */
  databasePath: string;
}

const COLLECTION_NAME_PATTERN = /^[a-z0-9_]+$/;

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS vector_collections (
  name TEXT PRIMARY KEY,
  dimensions INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS vector_documents (
  collection TEXT NOT NULL REFERENCES vector_collections(name) ON DELETE CASCADE,
  id TEXT NOT NULL,
  rowid_ref INTEGER NOT NULL,
  document TEXT NOT NULL,
  metadata TEXT NOT NULL,
  PRIMARY KEY (collection, id),
  UNIQUE (collection, rowid_ref)
);
`;

interface DocumentRow {
  id: string;
  rowid_ref: number;
  document: string;
  metadata: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * sqlite-vec reads vectors as little-endian float32 blobs
 */
function toBlob(vector: EmbeddingVector): Buffer {
  const floats = new Float32Array(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

function vecTable(name: string): string {
  return `"vec_${name}"`;
}

/**
 * SQLite-vec storage implementation
 */
export class SqliteVecStorage implements VectorStorage {
  private db: DatabaseType | null = null;
  private readonly databasePath: string;

  constructor(config: SqliteVecConfig) {
    if (!config.databasePath) {
      throw new VectorStorageError(
        'Database path is required',
        VectorStorageErrorCode.INVALID_CONFIG
      );
    }
    this.databasePath = config.databasePath;
  }

  async initialize(): Promise<void> {
    if (this.db !== null) return;

    try {
      if (this.databasePath !== ':memory:') {
        const dir = dirname(this.databasePath);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
      }

      const db = new Database(this.databasePath);
      sqliteVec.load(db);
      if (this.databasePath !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
      db.pragma('synchronous = NORMAL');
      db.pragma('foreign_keys = ON');
      db.exec(CREATE_TABLES);

      this.db = db;
    } catch (error) {
      throw new VectorStorageError(
        `Failed to initialize SQLite-vec: ${errorMessage(error)}`,
        VectorStorageErrorCode.CONNECTION_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  isReady(): boolean {
    return this.db !== null;
  }

  private database(): DatabaseType {
    if (this.db === null) {
      throw new VectorStorageError('Storage not initialized', VectorStorageErrorCode.NOT_INITIALIZED);
    }
    return this.db;
  }

  private assertCollectionName(name: string): void {
    if (!COLLECTION_NAME_PATTERN.test(name)) {
      throw new VectorStorageError(
        `Invalid collection name: ${name}`,
        VectorStorageErrorCode.INVALID_CONFIG
      );
    }
  }

  async getCollection(name: string): Promise<CollectionHandle | null> {
    this.assertCollectionName(name);
    const row = this.database()
      .prepare<[string], { dimensions: number }>(
        'SELECT dimensions FROM vector_collections WHERE name = ?'
      )
      .get(name);
    return row === undefined ? null : { name, dimensions: row.dimensions };
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

    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new VectorStorageError(
        'Vector dimensions must be positive',
        VectorStorageErrorCode.INVALID_CONFIG
      );
    }

    const db = this.database();
    try {
      db.transaction(() => {
        db.exec(
          `CREATE VIRTUAL TABLE IF NOT EXISTS ${vecTable(name)} USING vec0(
            embedding float[${dimensions}] distance_metric=cosine
          )`
        );
        db.prepare('INSERT INTO vector_collections (name, dimensions) VALUES (?, ?)').run(
          name,
          dimensions
        );
      })();
    } catch (error) {
      throw new VectorStorageError(
        `Failed to create collection ${name}: ${errorMessage(error)}`,
        VectorStorageErrorCode.COLLECTION_ERROR,
        error instanceof Error ? error : undefined
      );
    }

    return { name, dimensions };
  }

  async upsert(handle: CollectionHandle, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    const db = this.database();

    for (const record of records) {
      if (record.vector.length !== handle.dimensions) {
        throw new VectorStorageError(
          `Record ${record.id} has ${record.vector.length} dimensions, collection ${handle.name} expects ${handle.dimensions}`,
          VectorStorageErrorCode.DIMENSION_MISMATCH
        );
      }
    }

    try {
      const insertVec = db.prepare<[bigint, Buffer]>(
        `INSERT INTO ${vecTable(handle.name)}(rowid, embedding) VALUES (?, ?)`
      );
      const updateVec = db.prepare<[Buffer, bigint]>(
        `UPDATE ${vecTable(handle.name)} SET embedding = ? WHERE rowid = ?`
      );
      const upsertDoc = db.prepare<[string, string, number, string, string]>(
        `INSERT OR REPLACE INTO vector_documents (collection, id, rowid_ref, document, metadata)
         VALUES (?, ?, ?, ?, ?)`
      );
      const getExisting = db.prepare<[string, string], { rowid_ref: number }>(
        'SELECT rowid_ref FROM vector_documents WHERE collection = ? AND id = ?'
      );
      const getMaxRowid = db.prepare<[string], { max_rowid: number }>(
        'SELECT COALESCE(MAX(rowid_ref), 0) AS max_rowid FROM vector_documents WHERE collection = ?'
      );

      db.transaction((items: VectorRecord[]) => {
        let nextRowid = (getMaxRowid.get(handle.name)?.max_rowid ?? 0) + 1;

        for (const record of items) {
          const embedding = toBlob(record.vector);
          const existing = getExisting.get(handle.name, record.id);

          let rowidRef: number;
          if (existing !== undefined) {
            rowidRef = existing.rowid_ref;
            updateVec.run(embedding, BigInt(rowidRef));
          } else {
            rowidRef = nextRowid;
            nextRowid += 1;
            insertVec.run(BigInt(rowidRef), embedding);
          }

          upsertDoc.run(
            handle.name,
            record.id,
            rowidRef,
            record.document,
            JSON.stringify(record.metadata)
          );
        }
      })(records);
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
    const db = this.database();

    try {
      const knnResults = db
        .prepare<[Buffer, number], { rowid: number; distance: number }>(
          `SELECT rowid, distance
           FROM ${vecTable(handle.name)}
           WHERE embedding MATCH ?
           ORDER BY distance
           LIMIT ?`
        )
        .all(toBlob(vector), topK);

      if (knnResults.length === 0) {
        return [];
      }

      const distanceMap = new Map(knnResults.map((r) => [Number(r.rowid), r.distance]));
      const placeholders = knnResults.map(() => '?').join(', ');
      const rows = db
        .prepare<(string | number)[], DocumentRow>(
          `SELECT id, rowid_ref, document, metadata
           FROM vector_documents
           WHERE collection = ? AND rowid_ref IN (${placeholders})`
        )
        .all(handle.name, ...distanceMap.keys());

      const matches: VectorMatch[] = [];
      for (const row of rows) {
        const distance = distanceMap.get(row.rowid_ref);
        if (distance === undefined) continue;
        matches.push({
          id: row.id,
          document: row.document,
          metadata: SnippetMetadataSchema.parse(JSON.parse(row.metadata)),
          distance,
        });
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
    return this.database()
      .prepare<[string], { id: string }>(
        'SELECT id FROM vector_documents WHERE collection = ? ORDER BY id'
      )
      .all(handle.name)
      .map((r) => r.id);
  }

  async deleteIds(handle: CollectionHandle, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const db = this.database();

    try {
      const getRowid = db.prepare<[string, string], { rowid_ref: number }>(
        'SELECT rowid_ref FROM vector_documents WHERE collection = ? AND id = ?'
      );
      const deleteVec = db.prepare<[bigint]>(
        `DELETE FROM ${vecTable(handle.name)} WHERE rowid = ?`
      );
      const deleteDoc = db.prepare<[string, string]>(
        'DELETE FROM vector_documents WHERE collection = ? AND id = ?'
      );

      return db.transaction((items: string[]) => {
        let deleted = 0;
        for (const id of items) {
          const row = getRowid.get(handle.name, id);
          if (row === undefined) continue;
          deleteVec.run(BigInt(row.rowid_ref));
          deleted += deleteDoc.run(handle.name, id).changes;
        }
        return deleted;
      })(ids);
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
    const db = this.database();

    try {
      db.transaction(() => {
        db.exec(`DROP TABLE IF EXISTS ${vecTable(name)}`);
        db.prepare('DELETE FROM vector_documents WHERE collection = ?').run(name);
        db.prepare('DELETE FROM vector_collections WHERE name = ?').run(name);
      })();
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
    const row = this.database()
      .prepare<[string], { count: number }>(
        'SELECT COUNT(*) AS count FROM vector_documents WHERE collection = ?'
      )
      .get(handle.name);
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    if (this.db !== null) {
      this.db.close();
      this.db = null;
    }
  }
}
