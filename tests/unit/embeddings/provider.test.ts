import { describe, it, expect, vi, afterEach } from 'vitest';
import { createEmbeddingProvider } from '../../../src/embeddings/provider.js';
import { HashEmbeddingProvider } from '../../../src/embeddings/hash.js';
import { RemoteEmbeddingProvider } from '../../../src/embeddings/remote.js';
import { EmbeddingErrorCode } from '../../../src/embeddings/types.js';

function norm(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('HashEmbeddingProvider', () => {
  it('should return the same unit vector for the same text', async () => {
    const provider = new HashEmbeddingProvider(16);

    const first = await provider.embed('return a + b;');
    const second = await provider.embed('return a + b;');

    expect(first).toEqual(second);
    expect(first).toHaveLength(16);
    expect(norm(first)).toBeCloseTo(1, 6);
  });

  it('should return different vectors for different texts', async () => {
    const provider = new HashEmbeddingProvider(16);

    const [a, b] = await provider.embedBatch(['alpha', 'beta']);

    expect(a).not.toEqual(b);
  });
});

describe('RemoteEmbeddingProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should refuse to embed before initialization', async () => {
    const provider = new RemoteEmbeddingProvider({
      url: 'http://embed.test/embed',
      model: 'test-model',
      dimensions: 2,
    });

    await expect(provider.embed('x')).rejects.toMatchObject({
      code: EmbeddingErrorCode.NOT_INITIALIZED,
    });
  });

  it('should check /info and send bearer auth', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ model: 'test-model' })
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new RemoteEmbeddingProvider({
      url: 'http://embed.test/embed',
      model: 'test-model',
      dimensions: 2,
      apiKey: 'test-secret',
    });
    await provider.initialize();

    expect(provider.isReady()).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe('http://embed.test/info');
    expect(call?.[1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('should fall back to /health when /info is missing', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request) =>
      String(input).endsWith('/info') ? new Response('', { status: 404 }) : new Response('ok')
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new RemoteEmbeddingProvider({
      url: 'http://embed.test/embed',
      model: 'test-model',
      dimensions: 2,
    });
    await provider.initialize();

    expect(fetchMock.mock.calls.map((call) => String(call[0]))).toEqual([
      'http://embed.test/info',
      'http://embed.test/health',
    ]);
  });

  it('should report an unreachable service as a network error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const provider = new RemoteEmbeddingProvider({
      url: 'http://embed.test/embed',
      model: 'test-model',
      dimensions: 2,
    });

    await expect(provider.initialize()).rejects.toMatchObject({
      code: EmbeddingErrorCode.NETWORK_ERROR,
    });
  });

  it('should split texts into batches and keep their order', async () => {
    const bodies: string[][] = [];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
        if (String(input).endsWith('/info')) return jsonResponse({});
        const body: unknown = JSON.parse(String(init?.body));
        const texts =
          typeof body === 'object' && body !== null && 'texts' in body && Array.isArray(body.texts)
            ? body.texts.map(String)
            : [];
        bodies.push(texts);
        return jsonResponse({ embeddings: texts.map((t) => [t.length, 0]) });
      })
    );

    const provider = new RemoteEmbeddingProvider({
      url: 'http://embed.test/embed',
      model: 'test-model',
      dimensions: 2,
      batchSize: 2,
    });
    await provider.initialize();

    const vectors = await provider.embedBatch(['a', 'bb', 'ccc']);

    expect(bodies).toEqual([['a', 'bb'], ['ccc']]);
    expect(vectors).toEqual([
      [1, 0],
      [2, 0],
      [3, 0],
    ]);
  });

  it('should reject vectors of the wrong size', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (input: string | URL | Request) =>
        String(input).endsWith('/info') ? jsonResponse({}) : jsonResponse({ embeddings: [[1, 2, 3]] })
      )
    );

    const provider = new RemoteEmbeddingProvider({
      url: 'http://embed.test/embed',
      model: 'test-model',
      dimensions: 2,
    });
    await provider.initialize();

    await expect(provider.embed('x')).rejects.toMatchObject({
      code: EmbeddingErrorCode.DIMENSION_MISMATCH,
    });
  });

  it('should surface an API error status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (input: string | URL | Request) =>
        String(input).endsWith('/info') ? jsonResponse({}) : new Response('overloaded', { status: 503 })
      )
    );

    const provider = new RemoteEmbeddingProvider({
      url: 'http://embed.test/embed',
      model: 'test-model',
      dimensions: 2,
    });
    await provider.initialize();

    await expect(provider.embed('x')).rejects.toThrow('Embedding API error (503): overloaded');
  });
});

describe('createEmbeddingProvider', () => {
  it('should build a hash provider with the configured dimensions', () => {
    const provider = createEmbeddingProvider({
      provider: 'hash',
      model: 'hash',
      dimensions: 8,
      batchSize: 4,
    });

    expect(provider).toBeInstanceOf(HashEmbeddingProvider);
    expect(provider.dimensions).toBe(8);
  });

  it('should build an uninitialized remote provider', () => {
    const provider = createEmbeddingProvider({
      provider: 'remote',
      model: 'test-model',
      dimensions: 384,
      batchSize: 16,
      remoteUrl: 'http://embed.test/embed',
    });

    expect(provider).toBeInstanceOf(RemoteEmbeddingProvider);
    expect(provider.isReady()).toBe(false);
  });
});
