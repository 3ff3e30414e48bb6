/**
 * Embedding provider factory for Fathom
 */

import {
  type EmbeddingProvider,
  type EmbeddingProviderConfig,
  EmbeddingError,
  EmbeddingErrorCode,
} from './types.js';
import { RemoteEmbeddingProvider } from './remote.js';
import { HashEmbeddingProvider } from './hash.js';

/** Default remote embedding service URL */
const DEFAULT_REMOTE_URL = 'http://localhost:8080/embed';

/**
 * Create an embedding provider based on configuration
 *
 * The provider is returned uninitialized; callers initialize it on first use
 * so that commands which never embed do not need the service to be up.
 */
export function createEmbeddingProvider(config: EmbeddingProviderConfig): EmbeddingProvider {
  switch (config.provider) {
    case 'remote': {
      const options: ConstructorParameters<typeof RemoteEmbeddingProvider>[0] = {
        url: config.remoteUrl ?? DEFAULT_REMOTE_URL,
        model: config.model,
        dimensions: config.dimensions,
        batchSize: config.batchSize,
      };
      if (config.remoteApiKey !== undefined && config.remoteApiKey !== '') {
        options.apiKey = config.remoteApiKey;
      }
      return new RemoteEmbeddingProvider(options);
    }
    case 'hash':
      return new HashEmbeddingProvider(config.dimensions, config.model);
    default: {
      const unknownProvider: never = config.provider;
      throw new EmbeddingError(
        `Unknown embedding provider: ${String(unknownProvider)}`,
        EmbeddingErrorCode.NOT_INITIALIZED
      );
    }
  }
}
