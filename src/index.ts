/**
 * Fathom - code intelligence search over registered Java projects
 *
 * Main entry point for the library exports.
 */

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';
export * from './config/paths.js';

// Logging exports
export * from './logging/logger.js';

// Registry and storage exports
export * from './storage/types.js';
export * from './storage/registry.js';
export * from './storage/project-key.js';
export * from './storage/vector-storage.js';
export { createVectorStorage } from './storage/vector-factory.js';
export { SqliteVecStorage } from './storage/sqlite-vec.js';
export { QdrantStorage, fingerprintToPointId } from './storage/qdrant.js';

// Embedding exports
export * from './embeddings/types.js';
export { createEmbeddingProvider } from './embeddings/provider.js';

// Extraction exports
export * from './parser/types.js';
export * from './parser/extractor.js';
export * from './parser/discovery.js';
export * from './parser/fingerprint.js';

// Indexing exports
export * from './indexer/types.js';
export { Indexer } from './indexer/indexer.js';
export { SnippetVectorIndex, type VectorQueryOutcome } from './indexer/vector-index.js';

// Structural index exports
export * from './scip/types.js';
export * from './scip/symbol-query.js';
export { loadScipIndex, decodeScipIndex } from './scip/loader.js';
export { StructuralSearchEngine, findDefinitions, type StructuralOutcome } from './scip/structural.js';
export { StructuralIndexBuilder, type BuildOutcome } from './scip/builder.js';

// Dependency source exports
export * from './deps/importer.js';

// Search exports
export * from './search/index.js';

// Application exports
export { createAppContext, withContext, type AppContext } from './app/context.js';

// Version info
export const VERSION = '0.1.0';
