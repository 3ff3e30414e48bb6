/**
 * Embedding types for Fathom
 */

/**
 * Embedding vector (array of floats)
 */
export type EmbeddingVector = number[];

/**
 * Embedding provider interface
 */
export interface EmbeddingProvider {
  /** Provider name */
  readonly name: string;

  /** Model identifier the vectors come from */
  readonly model: string;

  /** Vector dimensions */
  readonly dimensions: number;

  /**
   * Generate embedding for a single text
   */
  embed(text: string): Promise<EmbeddingVector>;

  /**
   * Generate embeddings for multiple texts, one vector per text, in order
   */
  embedBatch(texts: string[]): Promise<EmbeddingVector[]>;

  /**
   * Initialize the provider. Safe to call more than once.
   */
  initialize(): Promise<void>;

  isReady(): boolean;
}

/**
 * Embedding provider configuration
 */
export interface EmbeddingProviderConfig {
  provider: 'remote' | 'hash';
  model: string;
  dimensions: number;
  batchSize: number;
  remoteUrl?: string;
  remoteApiKey?: string;
}

/**
 * Embedding error
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

/**
 * Embedding error codes
 */
export enum EmbeddingErrorCode {
  /** Provider not initialized */
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  /** Embedding generation failed */
  EMBEDDING_FAILED = 'EMBEDDING_FAILED',
  /** Returned vectors do not match the configured dimensions */
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  /** Network error (for remote providers) */
  NETWORK_ERROR = 'NETWORK_ERROR',
}
