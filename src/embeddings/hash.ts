/**
 * Deterministic hash-based embedding provider
 *
 * Same text, same unit vector; no model, no network. Vectors carry no
 * semantic meaning beyond exact-text identity. Used offline and in tests.
 */

import type { EmbeddingProvider, EmbeddingVector } from './types.js';

export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash';
  readonly model: string;
  readonly dimensions: number;

  constructor(dimensions: number, model: string = 'hash') {
    this.dimensions = dimensions;
    this.model = model;
  }

  async initialize(): Promise<void> {
    // Nothing to load
  }

  isReady(): boolean {
    return true;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    return this.hashToVector(text);
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map((t) => this.hashToVector(t));
  }

  private hashToVector(text: string): EmbeddingVector {
    const seed = djb2(text);

    const vec = Array.from({ length: this.dimensions }, (_, i) => {
      const state = (((seed * (i + 1) * 1103515245 + 12345) >>> 0) % 0x7fffffff) / 0x7fffffff;
      return state * 2 - 1;
    });

    const magnitude = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
    return vec.map((v) => (magnitude > 0 ? v / magnitude : 0));
  }
}

/**
 * djb2 string hash, unsigned 32-bit
 */
function djb2(str: string): number {
  let h = 5381;
  for (let i = 0; i < str.length; i++) {
    h = ((h * 33) ^ str.charCodeAt(i)) >>> 0;
  }
  return h;
}
