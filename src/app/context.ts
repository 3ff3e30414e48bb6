/**
 * Application context
 *
 * Builds every component from one configuration object. Shared by the CLI
 * and the MCP server. Backends connect lazily, so commands that never embed
 * or query vectors do not need the embedding service or Qdrant to be up.
 */

import { loadConfig, type LoadConfigOptions } from '../config/config.js';
import type { FathomConfig } from '../config/schema.js';
import { DependencyImporter } from '../deps/importer.js';
import { createEmbeddingProvider } from '../embeddings/provider.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { Indexer } from '../indexer/indexer.js';
import { ProjectLock } from '../indexer/lock.js';
import { SnippetVectorIndex } from '../indexer/vector-index.js';
import { createLogger, type FathomLogger, type LogStream } from '../logging/logger.js';
import { StructuralIndexBuilder } from '../scip/builder.js';
import { StructuralSearchEngine } from '../scip/structural.js';
import { LiteralSearchAdapter } from '../search/literal.js';
import { SearchRouter } from '../search/router.js';
import { ProjectRegistry } from '../storage/registry.js';
import { createVectorStorage } from '../storage/vector-factory.js';
import type { VectorStorage } from '../storage/vector-storage.js';
import type { ProcessRunner } from '../process/runner.js';

/**
 * Context containing all constructed components
 */
export interface AppContext {
  config: FathomConfig;
  logger: FathomLogger;
  registry: ProjectRegistry;
  vectorIndex: SnippetVectorIndex;
  indexer: Indexer;
  structuralBuilder: StructuralIndexBuilder;
  dependencies: DependencyImporter;
  router: SearchRouter;
  /** Close all connections */
  close(): Promise<void>;
}

/**
 * Options for creating the application context
 */
export interface CreateContextOptions extends LoadConfigOptions {
  /** Use this configuration instead of loading one */
  config?: FathomConfig;
  /** Use this logger instead of creating one from configuration */
  logger?: FathomLogger;
  /** Standard stream for log output when no log file is configured */
  logStream?: LogStream;
  /** Replace the configured vector storage backend */
  vectorStorage?: VectorStorage;
  /** Replace the configured embedding provider */
  embeddings?: EmbeddingProvider;
  /** Replace the external process runner */
  runner?: ProcessRunner;
}

export function createAppContext(options: CreateContextOptions = {}): AppContext {
  const config = options.config ?? loadConfig(options);
  const logger = options.logger ?? createLogger(config.logging, options.logStream ?? 'stderr');

  const registry = ProjectRegistry.create(config.storage.databasePath);
  const storage = options.vectorStorage ?? createVectorStorage(config.vectorStorage);
  const embeddings = options.embeddings ?? createEmbeddingProvider(config.embedding);
  const vectorIndex = new SnippetVectorIndex(storage, embeddings);
  const lock = new ProjectLock(config.indexing.lockDir, logger);

  const indexer = new Indexer(registry, vectorIndex, lock, config.indexing, logger);
  const structuralBuilder = new StructuralIndexBuilder(
    registry,
    lock,
    config.structural,
    logger,
    options.runner
  );
  const router = new SearchRouter({
    registry,
    vectorIndex,
    literal: new LiteralSearchAdapter(config.literal, logger, options.runner),
    structural: new StructuralSearchEngine(logger),
    searchConfig: config.search,
    structuralConfig: config.structural,
    logger,
  });

  return {
    config,
    logger,
    registry,
    vectorIndex,
    indexer,
    structuralBuilder,
    dependencies: new DependencyImporter(registry, config.dependencies, logger),
    router,
    async close(): Promise<void> {
      registry.close();
      await vectorIndex.close();
    },
  };
}

/**
 * Run a function with a context, ensuring cleanup afterwards
 */
export async function withContext<T>(
  fn: (context: AppContext) => Promise<T>,
  options: CreateContextOptions = {}
): Promise<T> {
  const context = createAppContext(options);
  try {
    return await fn(context);
  } finally {
    await context.close();
  }
}
