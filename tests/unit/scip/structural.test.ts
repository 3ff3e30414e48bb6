import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  decodeScipIndex,
  getScipIndexType,
  loadScipIndex,
  normalizeScipIndex,
} from '../../../src/scip/loader.js';
import { StructuralSearchEngine, findDefinitions } from '../../../src/scip/structural.js';
import { ScipIndexError, ScipIndexErrorCode, SymbolRole } from '../../../src/scip/types.js';
import { createSilentLogger } from '../../../src/logging/logger.js';

const GREET = 'semanticdb maven . . com/example/Main#greet().';
const OTHER_GREET = 'semanticdb maven . . com/other/Main#greet().';
const MAIN = 'semanticdb maven . . com/example/Main#main().';

function encodeIndex(value: Record<string, unknown>): Uint8Array {
  const type = getScipIndexType();
  return type.encode(type.fromObject(value)).finish();
}

const SAMPLE_INDEX = {
  metadata: { projectRoot: 'file:///workspace/demo' },
  documents: [
    {
      relativePath: 'src/main/java/com/example/Main.java',
      language: 'java',
      occurrences: [
        { symbol: MAIN, symbolRoles: SymbolRole.Definition, range: [6, 23, 27] },
        { symbol: GREET, symbolRoles: SymbolRole.ReadAccess, range: [7, 27, 32] },
        { symbol: GREET, symbolRoles: SymbolRole.Definition, range: [11, 25, 30] },
      ],
    },
    {
      relativePath: 'src/main/java/com/other/Main.java',
      language: 'java',
      occurrences: [
        { symbol: OTHER_GREET, symbolRoles: SymbolRole.Definition, range: [4, 8, 6, 9] },
        { symbol: OTHER_GREET, symbolRoles: SymbolRole.Definition, range: [9, 1] },
      ],
    },
  ],
};

describe('SCIP loader', () => {
  it('should decode documents and occurrences', () => {
    const index = decodeScipIndex(encodeIndex(SAMPLE_INDEX));

    expect(index.malformedRecords).toBe(0);
    expect(index.documents.map((d) => d.relativePath)).toEqual([
      'src/main/java/com/example/Main.java',
      'src/main/java/com/other/Main.java',
    ]);
    expect(index.documents[0]?.occurrences[2]).toEqual({
      symbol: GREET,
      symbolRoles: 1,
      range: [11, 25, 30],
    });
  });

  it('should skip and count malformed records', () => {
    const index = normalizeScipIndex({
      documents: [
        { relativePath: '', occurrences: [] },
        {
          relativePath: 'A.java',
          occurrences: [
            { symbol: 'a', symbolRoles: 'definition', range: [] },
            { symbol: 'b', symbolRoles: 1, range: [0, 0, 1] },
          ],
        },
      ],
    });

    expect(index.malformedRecords).toBe(2);
    expect(index.documents).toEqual([
      { relativePath: 'A.java', occurrences: [{ symbol: 'b', symbolRoles: 1, range: [0, 0, 1] }] },
    ]);
  });

  it('should fail on bytes that are not an index', () => {
    let caught: unknown;
    try {
      decodeScipIndex(new Uint8Array([0xff, 0xff, 0xff]));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ScipIndexError);
    expect(caught instanceof ScipIndexError ? caught.code : null).toBe(
      ScipIndexErrorCode.DECODE_FAILED
    );
  });

  it('should report a missing file as NOT_FOUND', async () => {
    await expect(loadScipIndex('/no/such/index.scip')).rejects.toMatchObject({
      code: ScipIndexErrorCode.NOT_FOUND,
    });
  });
});

describe('findDefinitions', () => {
  const index = decodeScipIndex(encodeIndex(SAMPLE_INDEX));

  it('should return only definitions with 1-based positions', () => {
    const { matches, skippedRanges } = findDefinitions(
      index,
      '/workspace/demo',
      'com/example/Main#greet().'
    );

    expect(skippedRanges).toBe(0);
    expect(matches).toEqual([
      {
        symbol: GREET,
        filePath: '/workspace/demo/src/main/java/com/example/Main.java',
        startLine: 12,
        startChar: 26,
        endLine: 12,
        endChar: 31,
      },
    ]);
  });

  it('should match every package for a type-qualified suffix', () => {
    const { matches, skippedRanges } = findDefinitions(index, '/workspace/demo', '/Main#greet().');

    expect(matches.map((m) => m.symbol)).toEqual([GREET, OTHER_GREET]);
    expect(matches[1]).toMatchObject({ startLine: 5, startChar: 9, endLine: 7, endChar: 10 });
    expect(skippedRanges).toBe(1);
  });

  it('should return nothing for an unknown method', () => {
    expect(findDefinitions(index, '/p', 'com/example/Main#missing().').matches).toEqual([]);
  });
});

describe('StructuralSearchEngine', () => {
  let tempDir: string;
  let indexPath: string;
  const engine = new StructuralSearchEngine(createSilentLogger());

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'fathom-scip-'));
    indexPath = join(tempDir, 'demo.scip');
    writeFileSync(indexPath, encodeIndex(SAMPLE_INDEX));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should find the definition of a dotted query', async () => {
    const outcome = await engine.search(indexPath, '/workspace/demo', 'com.example.Main.greet');

    expect(outcome.kind).toBe('ok');
    expect(outcome.kind === 'ok' ? outcome.matches.map((m) => m.startLine) : []).toEqual([12]);
  });

  it('should report a query that is too short', async () => {
    const outcome = await engine.search(indexPath, '/workspace/demo', 'greet');

    expect(outcome).toEqual({ kind: 'invalid-query', query: 'greet', reason: 'too-short' });
  });

  it('should report a query with an empty segment', async () => {
    const outcome = await engine.search(indexPath, '/workspace/demo', 'com..Main.greet');

    expect(outcome).toEqual({
      kind: 'invalid-query',
      query: 'com..Main.greet',
      reason: 'empty-segment',
    });
  });

  it('should report a missing index', async () => {
    const missing = join(tempDir, 'none.scip');

    const outcome = await engine.search(missing, '/workspace/demo', 'com.example.Main.greet');

    expect(outcome).toEqual({ kind: 'index-not-found', indexPath: missing });
  });
});
