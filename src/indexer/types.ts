/**
 * Indexer types for Fathom
 */

/**
 * Progress event types for indexing
 */
export type IndexingEventType =
  | 'started'
  | 'files_listed'
  | 'file_indexed'
  | 'file_skipped'
  | 'orphans_pruned'
  | 'completed';

/**
 * Progress event emitted during indexing
 */
export interface IndexingProgressEvent {
  type: IndexingEventType;
  projectName: string;
  /** Current file being processed (if applicable) */
  currentFile?: string;
  /** Total files to process */
  totalFiles?: number;
  /** Files processed so far, skipped ones included */
  filesProcessed?: number;
  /** Snippets upserted so far */
  snippetsIndexed?: number;
  /** Orphaned snippet ids deleted */
  orphansPruned?: number;
  /** Error message (for file_skipped) */
  error?: string;
  timestamp: Date;
}

/**
 * Options for a semantic index run
 */
export interface IndexingOptions {
  /** Checked between files; an aborted signal ends the run */
  signal?: AbortSignal;
  /** Drop the project's collection before indexing */
  rebuild?: boolean;
  onProgress?: (event: IndexingProgressEvent) => void;
}

/**
 * Outcome of a semantic index run
 */
export type IndexingResult =
  | {
      status: 'indexed';
      snippetsIndexed: number;
      filesProcessed: number;
      filesSkipped: number;
      orphansPruned: number;
      durationMs: number;
    }
  | { status: 'project-not-found'; projectName: string }
  | { status: 'no-source-files'; projectPath: string };

/**
 * Indexer error
 */
export class IndexerError extends Error {
  constructor(
    message: string,
    public readonly code: IndexerErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'IndexerError';
  }
}

/**
 * Indexer error codes
 */
export enum IndexerErrorCode {
  /** Indexing already in progress */
  INDEXING_IN_PROGRESS = 'INDEXING_IN_PROGRESS',
  /** Lock acquisition failed */
  LOCK_FAILED = 'LOCK_FAILED',
  /** Run cancelled through its AbortSignal */
  ABORTED = 'ABORTED',
  /** Embedding failed */
  EMBEDDING_ERROR = 'EMBEDDING_ERROR',
  /** Storage error */
  STORAGE_ERROR = 'STORAGE_ERROR',
}
