import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SqliteVecStorage } from '../../../src/storage/sqlite-vec.js';
import {
  VectorStorageError,
  VectorStorageErrorCode,
  type VectorRecord,
} from '../../../src/storage/vector-storage.js';

function unit(index: number, dimensions = 4): number[] {
  return Array.from({ length: dimensions }, (_, i) => (i === index ? 1 : 0));
}

function record(id: string, vector: number[], methodName = id): VectorRecord {
  return {
    id,
    vector,
    document: `{ ${methodName}(); }`,
    metadata: {
      filePath: 'src/A.java',
      className: 'A',
      methodName,
      parameters: '()',
      returnType: 'void',
      startLine: 1,
      endLine: 1,
    },
  };
}

describe('SqliteVecStorage', () => {
  let tempDir: string;
  let storage: SqliteVecStorage;

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'fathom-vec-'));
    storage = new SqliteVecStorage({ databasePath: join(tempDir, 'vectors.db') });
    await storage.initialize();
  });

  afterEach(async () => {
    await storage.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return null for a collection that was never created', async () => {
    expect(await storage.getCollection('snippets_demo')).toBeNull();
  });

  it('should create a collection once', async () => {
    const first = await storage.getOrCreateCollection('snippets_demo', 4);
    const second = await storage.getOrCreateCollection('snippets_demo', 4);

    expect(second).toEqual(first);
    expect(await storage.getCollection('snippets_demo')).toEqual({ name: 'snippets_demo', dimensions: 4 });
  });

  it('should reject a dimension change', async () => {
    await storage.getOrCreateCollection('snippets_demo', 4);

    await expect(storage.getOrCreateCollection('snippets_demo', 8)).rejects.toMatchObject({
      code: VectorStorageErrorCode.DIMENSION_MISMATCH,
    });
  });

  it('should reject unsafe collection names', async () => {
    await expect(storage.getOrCreateCollection('bad"name', 4)).rejects.toThrow(VectorStorageError);
  });

  it('should return nearest records in ascending distance', async () => {
    const handle = await storage.getOrCreateCollection('snippets_demo', 4);
    await storage.upsert(handle, [record('a', unit(0)), record('b', unit(1)), record('c', [1, 1, 0, 0])]);

    const matches = await storage.query(handle, unit(0), 2);

    expect(matches.map((m) => m.id)).toEqual(['a', 'c']);
    expect(matches[0]?.distance).toBeCloseTo(0, 5);
    expect(matches[1]?.distance).toBeCloseTo(1 - Math.SQRT1_2, 4);
    expect(matches[0]?.metadata.methodName).toBe('a');
    expect(matches[0]?.document).toBe('{ a(); }');
  });

  it('should replace a record with the same id', async () => {
    const handle = await storage.getOrCreateCollection('snippets_demo', 4);
    await storage.upsert(handle, [record('a', unit(0), 'before')]);

    await storage.upsert(handle, [record('a', unit(2), 'after')]);

    expect(await storage.count(handle)).toBe(1);
    const [match] = await storage.query(handle, unit(2), 1);
    expect(match?.metadata.methodName).toBe('after');
    expect(match?.distance).toBeCloseTo(0, 5);
  });

  it('should reject vectors of the wrong size', async () => {
    const handle = await storage.getOrCreateCollection('snippets_demo', 4);

    await expect(storage.upsert(handle, [record('a', unit(0, 3))])).rejects.toMatchObject({
      code: VectorStorageErrorCode.DIMENSION_MISMATCH,
    });
  });

  it('should list and delete ids', async () => {
    const handle = await storage.getOrCreateCollection('snippets_demo', 4);
    await storage.upsert(handle, [record('b', unit(1)), record('a', unit(0)), record('c', unit(2))]);

    expect(await storage.listIds(handle)).toEqual(['a', 'b', 'c']);
    expect(await storage.deleteIds(handle, ['b', 'missing'])).toBe(1);
    expect(await storage.listIds(handle)).toEqual(['a', 'c']);
    expect((await storage.query(handle, unit(1), 3)).map((m) => m.id)).not.toContain('b');
  });

  it('should keep collections apart', async () => {
    const one = await storage.getOrCreateCollection('snippets_one', 4);
    const two = await storage.getOrCreateCollection('snippets_two', 4);
    await storage.upsert(one, [record('a', unit(0))]);
    await storage.upsert(two, [record('a', unit(1)), record('b', unit(2))]);

    expect(await storage.count(one)).toBe(1);
    expect(await storage.count(two)).toBe(2);
  });

  it('should drop a collection with its records', async () => {
    const handle = await storage.getOrCreateCollection('snippets_demo', 4);
    await storage.upsert(handle, [record('a', unit(0))]);

    expect(await storage.dropCollection('snippets_demo')).toBe(true);
    expect(await storage.getCollection('snippets_demo')).toBeNull();
    expect(await storage.dropCollection('snippets_demo')).toBe(false);
  });

  it('should persist across reopen', async () => {
    const handle = await storage.getOrCreateCollection('snippets_demo', 4);
    await storage.upsert(handle, [record('a', unit(0))]);
    await storage.close();

    storage = new SqliteVecStorage({ databasePath: join(tempDir, 'vectors.db') });
    await storage.initialize();

    const reopened = await storage.getCollection('snippets_demo');
    expect(reopened).not.toBeNull();
    if (reopened !== null) {
      expect(await storage.listIds(reopened)).toEqual(['a']);
    }
  });

  it('should fail before initialization', async () => {
    const fresh = new SqliteVecStorage({ databasePath: join(tempDir, 'other.db') });

    await expect(fresh.getCollection('snippets_demo')).rejects.toMatchObject({
      code: VectorStorageErrorCode.NOT_INITIALIZED,
    });
  });
});
