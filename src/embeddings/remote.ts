/**
 * Remote embedding provider for Fathom
 *
 * HTTP-based embedding provider that calls a remote API.
 *
 * Expected API format:
 * - POST /embed
 * - Body: { "texts": ["text1", "text2", ...], "model": "all-MiniLM-L6-v2" }
 * - Response: { "embeddings": [[...], [...]], "dimensions": 384 }
 */

import { z } from 'zod';
import {
  type EmbeddingProvider,
  type EmbeddingVector,
  EmbeddingError,
  EmbeddingErrorCode,
} from './types.js';

/**
 * Response format from the embedding API
 */
const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).optional(),
  dimensions: z.number().int().optional(),
  error: z.string().optional(),
});

export interface RemoteEmbeddingOptions {
  url: string;
  model: string;
  dimensions: number;
  apiKey?: string;
  batchSize?: number;
}

/**
 * Remote embedding provider
 */
export class RemoteEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'remote';
  readonly model: string;
  readonly dimensions: number;

  private readonly url: string;
  private readonly apiKey: string | undefined;
  private readonly batchSize: number;
  private initialized = false;

  constructor(options: RemoteEmbeddingOptions) {
    this.url = options.url;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.apiKey = options.apiKey;
    this.batchSize = options.batchSize ?? 32;
  }

  /**
   * Verify the endpoint is reachable via /info, falling back to /health
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      const infoUrl = this.url.replace(/\/embed\/?$/, '/info');
      const response = await fetch(infoUrl, {
        method: 'GET',
        headers: this.getHeaders(),
      });

      if (!response.ok) {
        const healthUrl = this.url.replace(/\/embed\/?$/, '/health');
        const healthResponse = await fetch(healthUrl, {
          method: 'GET',
          headers: this.getHeaders(),
        });

        if (!healthResponse.ok) {
          throw new Error(`Health check failed: ${healthResponse.status}`);
        }
      }

      this.initialized = true;
    } catch (error) {
      throw new EmbeddingError(
        `Failed to connect to embedding service at ${this.url}: ${error instanceof Error ? error.message : String(error)}`,
        EmbeddingErrorCode.NETWORK_ERROR,
        error instanceof Error ? error : undefined
      );
    }
  }

  isReady(): boolean {
    return this.initialized;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const results = await this.embedBatch([text]);
    const result = results[0];
    if (result === undefined) {
      throw new EmbeddingError(
        'No embedding result returned',
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }
    return result;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (!this.initialized) {
      throw new EmbeddingError('Provider not initialized', EmbeddingErrorCode.NOT_INITIALIZED);
    }
    if (texts.length === 0) {
      return [];
    }

    try {
      const results: EmbeddingVector[] = [];
      for (let i = 0; i < texts.length; i += this.batchSize) {
        const batch = texts.slice(i, i + this.batchSize);
        results.push(...(await this.embedBatchRequest(batch)));
      }
      return results;
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(
        `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
        EmbeddingErrorCode.NETWORK_ERROR,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Make a single batch request to the embedding API
   */
  private async embedBatchRequest(texts: string[]): Promise<EmbeddingVector[]> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: this.getHeaders(),
      body: JSON.stringify({ texts, model: this.model }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new EmbeddingError(
        `Embedding API error (${response.status}): ${errorText}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }

    const parsed = EmbedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError(
        `Invalid response format: ${parsed.error.message}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }

    const data = parsed.data;
    if (data.error !== undefined) {
      throw new EmbeddingError(
        `Embedding API returned error: ${data.error}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }
    if (data.embeddings === undefined) {
      throw new EmbeddingError(
        'Invalid response format: missing embeddings array',
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }
    if (data.embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding count mismatch: expected ${texts.length}, got ${data.embeddings.length}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }
    for (const vector of data.embeddings) {
      if (vector.length !== this.dimensions) {
        throw new EmbeddingError(
          `Expected ${this.dimensions}-dimensional vectors, got ${vector.length}`,
          EmbeddingErrorCode.DIMENSION_MISMATCH
        );
      }
    }

    return data.embeddings;
  }
}
