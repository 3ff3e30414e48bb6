/**
 * Configuration schema for Fathom
 *
 * Validates configuration using Zod and provides TypeScript types.
 * Path defaults are computed at parse time so that `FATHOM_DATA_DIR`
 * set before loading is honoured.
 */

import { z } from 'zod';
import {
  getDefaultDatabasePath,
  getDefaultDependencyDir,
  getDefaultLockDir,
  getDefaultMavenCacheDir,
  getDefaultStructuralIndexDir,
  getDefaultVectorDatabasePath,
} from './paths.js';

/**
 * Vector storage provider enum
 */
export const VectorProviderSchema = z.enum(['sqlite-vec', 'qdrant']);

/**
 * sqlite-vec configuration
 */
export const SqliteVecConfigSchema = z.object({
  databasePath: z.string().min(1).default(() => getDefaultVectorDatabasePath()),
});

/**
 * Qdrant vector database configuration
 */
export const QdrantConfigSchema = z.object({
  url: z.string().url().default('http://localhost:6333'),
  apiKey: z.string().optional(),
});

/**
 * Vector storage configuration
 *
 * - sqlite-vec (default): single-file SQLite database
 * - qdrant: Qdrant vector database server
 */
export const VectorStorageConfigSchema = z.object({
  provider: VectorProviderSchema.default('sqlite-vec'),
  sqliteVec: SqliteVecConfigSchema.default({}),
  qdrant: QdrantConfigSchema.default({}),
});

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['remote', 'hash']).default('remote'),
  model: z.string().min(1).default('all-MiniLM-L6-v2'),
  dimensions: z.number().int().min(2).max(4096).default(384),
  batchSize: z.number().int().min(1).max(256).default(32),
  remoteUrl: z.string().url().default('http://localhost:8080/embed'),
  remoteApiKey: z.string().optional(),
});

/**
 * Semantic indexing configuration
 */
export const IndexingConfigSchema = z.object({
  extensions: z.array(z.string().startsWith('.')).min(1).default(['.java']),
  excludePatterns: z.array(z.string()).default([
    '**/.git/**',
    '**/node_modules/**',
    '**/build/**',
    '**/target/**',
    '**/out/**',
  ]),
  /** Delete stale snippet ids after a run in which every file extracted */
  pruneOrphans: z.boolean().default(true),
  lockDir: z.string().min(1).default(() => getDefaultLockDir()),
});

/**
 * Literal search (ripgrep) configuration
 */
export const LiteralConfigSchema = z.object({
  command: z.string().min(1).default('rg'),
  timeoutMs: z.number().int().min(100).default(30000),
});

/**
 * Structural index configuration
 */
export const StructuralConfigSchema = z.object({
  indexDir: z.string().min(1).default(() => getDefaultStructuralIndexDir()),
  command: z.string().min(1).default('scip-java'),
  timeoutMs: z.number().int().min(100).default(600000),
});

/**
 * Dependency source import configuration
 */
export const DependenciesConfigSchema = z.object({
  /** Scanned recursively for `*-sources.jar` */
  cacheDir: z.string().min(1).default(() => getDefaultMavenCacheDir()),
  /** Each jar is unpacked into `<extractDir>/dep_<artifact>` */
  extractDir: z.string().min(1).default(() => getDefaultDependencyDir()),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  defaultTopK: z.number().int().min(1).max(100).default(5),
  maxTopK: z.number().int().min(1).max(500).default(100),
});

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * Registry storage configuration
 */
export const StorageConfigSchema = z.object({
  databasePath: z.string().min(1).default(() => getDefaultDatabasePath()),
});

/**
 * Complete Fathom configuration schema
 */
export const FathomConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  vectorStorage: VectorStorageConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
  indexing: IndexingConfigSchema.default({}),
  literal: LiteralConfigSchema.default({}),
  structural: StructuralConfigSchema.default({}),
  dependencies: DependenciesConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type VectorProvider = z.infer<typeof VectorProviderSchema>;
export type SqliteVecConfig = z.infer<typeof SqliteVecConfigSchema>;
export type QdrantConfig = z.infer<typeof QdrantConfigSchema>;
export type VectorStorageConfig = z.infer<typeof VectorStorageConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;
export type LiteralConfig = z.infer<typeof LiteralConfigSchema>;
export type StructuralConfig = z.infer<typeof StructuralConfigSchema>;
export type DependenciesConfig = z.infer<typeof DependenciesConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type FathomConfig = z.infer<typeof FathomConfigSchema>;

/**
 * Input shape accepted before defaults are applied
 */
export type FathomConfigInput = z.input<typeof FathomConfigSchema>;

/**
 * Validate and parse configuration object
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): FathomConfig {
  return FathomConfigSchema.parse(config);
}
