/**
 * Vector storage factory for Fathom
 *
 * Creates the storage implementation named by configuration.
 * Default: sqlite-vec (single file, no server)
 * Optional: Qdrant (requires a running server)
 */

import type { VectorStorageConfig } from '../config/schema.js';
import type { VectorStorage } from './vector-storage.js';
import { SqliteVecStorage } from './sqlite-vec.js';
import { QdrantStorage, type QdrantConfig } from './qdrant.js';

/**
 * Create a vector storage instance from configuration
 *
 * The instance is returned uninitialized; callers initialize it on first use.
 */
export function createVectorStorage(config: VectorStorageConfig): VectorStorage {
  switch (config.provider) {
    case 'qdrant': {
      const qdrantConfig: QdrantConfig = { url: config.qdrant.url };
      if (config.qdrant.apiKey) {
        qdrantConfig.apiKey = config.qdrant.apiKey;
      }
      return new QdrantStorage(qdrantConfig);
    }
    case 'sqlite-vec':
      return new SqliteVecStorage({ databasePath: config.sqliteVec.databasePath });
    default: {
      const unknownProvider: never = config.provider;
      throw new Error(`Unknown vector storage provider: ${String(unknownProvider)}`);
    }
  }
}
