/**
 * Semantic indexing pipeline for Fathom
 *
 * resolve project → discover files → extract → embed → upsert → touch
 */

import type { IndexingConfig } from '../config/schema.js';
import { createChildLogger, type FathomLogger } from '../logging/logger.js';
import { discoverSourceFiles, extractFiles } from '../parser/discovery.js';
import { fingerprintSnippet } from '../parser/fingerprint.js';
import type { Snippet } from '../parser/types.js';
import type { ProjectRegistry } from '../storage/registry.js';
import type { CollectionHandle, VectorRecord } from '../storage/vector-storage.js';
import { EmbeddingError } from '../embeddings/types.js';
import { VectorStorageError } from '../storage/vector-storage.js';
import type { ProjectLock } from './lock.js';
import type { SnippetVectorIndex } from './vector-index.js';
import {
  type IndexingOptions,
  type IndexingProgressEvent,
  type IndexingResult,
  IndexerError,
  IndexerErrorCode,
} from './types.js';

function toRecord(snippet: Snippet, vector: number[]): VectorRecord {
  return {
    id: fingerprintSnippet(snippet),
    vector,
    document: snippet.codeBody,
    metadata: {
      filePath: snippet.filePath,
      className: snippet.className,
      methodName: snippet.methodName,
      parameters: snippet.parameters,
      returnType: snippet.returnType,
      startLine: snippet.startLine,
      endLine: snippet.endLine,
    },
  };
}

/**
 * Wrap storage and embedding failures in IndexerError; pass others through
 */
function wrapBackendError(error: unknown, projectName: string): unknown {
  if (error instanceof EmbeddingError) {
    return new IndexerError(
      `Embedding failed while indexing ${projectName}: ${error.message}`,
      IndexerErrorCode.EMBEDDING_ERROR,
      error
    );
  }
  if (error instanceof VectorStorageError) {
    return new IndexerError(
      `Vector storage failed while indexing ${projectName}: ${error.message}`,
      IndexerErrorCode.STORAGE_ERROR,
      error
    );
  }
  return error;
}

/**
 * Indexer orchestrator
 */
export class Indexer {
  private readonly logger: FathomLogger;

  constructor(
    private readonly registry: ProjectRegistry,
    private readonly vectorIndex: SnippetVectorIndex,
    private readonly lock: ProjectLock,
    private readonly config: IndexingConfig,
    logger: FathomLogger
  ) {
    this.logger = createChildLogger(logger, { component: 'indexer' });
  }

  /**
   * Whether a run for the project is in progress in this process
   */
  isIndexingInProgress(projectName: string): boolean {
    return this.lock.isHeld(projectName);
  }

  /**
   * Index every Java method of a registered project
   *
   * @throws IndexerError INDEXING_IN_PROGRESS, LOCK_FAILED, ABORTED,
   * EMBEDDING_ERROR or STORAGE_ERROR
   */
  async runIndex(projectName: string, options: IndexingOptions = {}): Promise<IndexingResult> {
    return this.lock.withLock(projectName, 'semantic-index', async () => {
      try {
        return await this.indexProject(projectName, options);
      } catch (error) {
        throw wrapBackendError(error, projectName);
      }
    });
  }

  private async indexProject(
    projectName: string,
    options: IndexingOptions
  ): Promise<IndexingResult> {
    const { signal, rebuild, onProgress } = options;
    const startTime = Date.now();
    const log = this.logger.child({ project: projectName });

    const emitProgress = (
      event: Omit<IndexingProgressEvent, 'projectName' | 'timestamp'>
    ): void => {
      if (onProgress) {
        onProgress({ projectName, timestamp: new Date(), ...event });
      }
    };

    const project = this.registry.find(projectName);
    if (project === null) {
      return { status: 'project-not-found', projectName };
    }

    emitProgress({ type: 'started' });

    const files = await discoverSourceFiles(project.path, {
      extensions: this.config.extensions,
      excludePatterns: this.config.excludePatterns,
    });
    if (files.length === 0) {
      log.info({ path: project.path }, 'No source files found');
      return { status: 'no-source-files', projectPath: project.path };
    }

    emitProgress({ type: 'files_listed', totalFiles: files.length, filesProcessed: 0 });

    if (rebuild === true) {
      const dropped = await this.vectorIndex.drop(projectName);
      log.info({ dropped }, 'Dropped collection for rebuild');
    }
    const handle = await this.vectorIndex.getOrCreateCollection(projectName);

    const producedIds = new Set<string>();
    let filesProcessed = 0;
    let filesSkipped = 0;
    let snippetsIndexed = 0;

    for await (const extraction of extractFiles(project.path, files)) {
      this.throwIfAborted(signal, projectName);
      filesProcessed++;

      if (extraction.kind === 'failed') {
        filesSkipped++;
        log.warn(
          { file: extraction.relativePath, err: extraction.error },
          'Skipping file that failed to extract'
        );
        emitProgress({
          type: 'file_skipped',
          currentFile: extraction.relativePath,
          totalFiles: files.length,
          filesProcessed,
          error: extraction.error.message,
        });
        continue;
      }

      const stored = await this.storeSnippets(handle, extraction.snippets);
      for (const id of stored) {
        producedIds.add(id);
      }
      snippetsIndexed += stored.length;

      emitProgress({
        type: 'file_indexed',
        currentFile: extraction.relativePath,
        totalFiles: files.length,
        filesProcessed,
        snippetsIndexed,
      });
    }

    let orphansPruned = 0;
    if (!this.config.pruneOrphans) {
      log.debug('Orphan pruning disabled');
    } else if (filesSkipped > 0) {
      log.warn({ filesSkipped }, 'Some files failed to extract; keeping previously indexed snippets');
    } else {
      orphansPruned = await this.vectorIndex.prune(handle, producedIds);
      if (orphansPruned > 0) {
        emitProgress({ type: 'orphans_pruned', orphansPruned });
      }
    }

    this.registry.touch(projectName);

    const durationMs = Date.now() - startTime;
    emitProgress({ type: 'completed', filesProcessed, snippetsIndexed, orphansPruned });
    log.info(
      { filesProcessed, filesSkipped, snippetsIndexed, orphansPruned, durationMs },
      'Indexing completed'
    );

    return {
      status: 'indexed',
      snippetsIndexed,
      filesProcessed,
      filesSkipped,
      orphansPruned,
      durationMs,
    };
  }

  /**
   * Embed one file's snippets in a single batch and upsert them
   *
   * @returns Fingerprints written
   */
  private async storeSnippets(handle: CollectionHandle, snippets: Snippet[]): Promise<string[]> {
    if (snippets.length === 0) return [];

    const vectors = await this.vectorIndex.embedTexts(snippets.map((s) => s.codeBody));
    const records: VectorRecord[] = [];
    snippets.forEach((snippet, i) => {
      const vector = vectors[i];
      if (vector !== undefined) {
        records.push(toRecord(snippet, vector));
      }
    });

    await this.vectorIndex.upsert(handle, records);
    return records.map((r) => r.id);
  }

  private throwIfAborted(signal: AbortSignal | undefined, projectName: string): void {
    if (signal?.aborted === true) {
      throw new IndexerError(`Indexing of ${projectName} was aborted`, IndexerErrorCode.ABORTED);
    }
  }
}
