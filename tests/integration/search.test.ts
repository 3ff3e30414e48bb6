import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { chmodSync, mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { createAppContext, type AppContext } from '../../src/app/context.js';
import { createConfig } from '../../src/config/config.js';
import { createSilentLogger } from '../../src/logging/logger.js';
import { getScipIndexType } from '../../src/scip/loader.js';
import { structuralIndexPathFor } from '../../src/storage/project-key.js';

const FIXTURE_DIR = fileURLToPath(new URL('../fixtures/sample-java', import.meta.url));
const MAIN_JAVA = 'src/main/java/com/example/Main.java';
const RG_STANDIN = fileURLToPath(new URL('../fixtures/bin/rg.mjs', import.meta.url));

const HELLO_JAVA = [
  'package demo;',
  '',
  'public class Hello {',
  '    void say() {',
  '        System.out.println("hi");',
  '        System.out.println("bye");',
  '    }',
  '}',
  '',
].join('\n');

/**
 * Executable that runs the ripgrep stand-in with the current node binary
 */
function writeRipgrepStandIn(dir: string): string {
  const path = join(dir, 'rg');
  writeFileSync(path, `#!/bin/sh\nexec "${process.execPath}" "${RG_STANDIN}" "$@"\n`);
  chmodSync(path, 0o755);
  return path;
}

describe('search over an indexed project', () => {
  let tempDir: string;
  let context: AppContext;
  let root: string;
  let helloRoot: string;

  beforeAll(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'fathom-integration-'));
    mkdirSync(join(tempDir, 'hello'));
    writeFileSync(join(tempDir, 'hello', 'Hello.java'), HELLO_JAVA);
    context = createAppContext({
      config: createConfig({
        storage: { databasePath: join(tempDir, 'fathom.db') },
        vectorStorage: { provider: 'sqlite-vec', sqliteVec: { databasePath: join(tempDir, 'vectors.db') } },
        embedding: { provider: 'hash', dimensions: 32 },
        indexing: { lockDir: join(tempDir, 'locks') },
        literal: { command: writeRipgrepStandIn(tempDir), timeoutMs: 10000 },
        structural: { indexDir: join(tempDir, 'scip') },
      }),
      logger: createSilentLogger(),
    });
    context.registry.register('demo', FIXTURE_DIR);
    root = context.registry.resolve('demo');
    context.registry.register('hello', join(tempDir, 'hello'));
    helloRoot = context.registry.resolve('hello');

    const result = await context.indexer.runIndex('demo');
    expect(result.status).toBe('indexed');
  });

  afterAll(async () => {
    await context.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should record the indexing time', () => {
    expect(context.registry.get('demo').lastIndexedAt).not.toBeNull();
  });

  it('should rank the method whose body matches the query first', async () => {
    const all = await context.router.route({ projectName: 'demo', searchType: 'semantic', query: 'greeting', topK: 10 });
    expect(all.ok).toBe(true);
    if (!all.ok || all.response.searchType !== 'semantic') return;
    expect(all.response.results.map((r) => r.metadata.methodName).sort()).toEqual([
      'greet',
      'helperMethod',
      'main',
    ]);

    const greet = all.response.results.find((r) => r.metadata.methodName === 'greet');
    expect(greet?.metadata).toMatchObject({ filePath: MAIN_JAVA, className: 'Main', startLine: 12, endLine: 17 });
    if (greet === undefined) return;

    const outcome = await context.router.route({
      projectName: 'demo',
      searchType: 'semantic',
      query: greet.document,
      topK: 1,
    });

    expect(outcome.ok && outcome.response.results[0]).toMatchObject({ id: greet.id });
  });

  it('should find exact text across the project', async () => {
    const outcome = await context.router.route({
      projectName: 'demo',
      searchType: 'literal',
      query: 'Hello, stranger',
    });

    expect(outcome).toEqual({
      ok: true,
      response: {
        searchType: 'literal',
        message: 'Found 1 literal match',
        results: [
          {
            filePath: join(root, MAIN_JAVA),
            lineNumber: 14,
            matchText: '            return "Hello, stranger";',
            absoluteOffset: expect.any(Number),
            submatches: [{ start: 20, end: 35, text: 'Hello, stranger' }],
          },
        ],
      },
    });
  });

  it('should return exactly one match for a line that occurs once', async () => {
    const outcome = await context.router.route({
      projectName: 'hello',
      searchType: 'literal',
      query: 'System.out.println("hi");',
    });

    expect(outcome).toEqual({
      ok: true,
      response: {
        searchType: 'literal',
        message: 'Found 1 literal match',
        results: [
          {
            filePath: join(helloRoot, 'Hello.java'),
            lineNumber: 5,
            matchText: '        System.out.println("hi");',
            absoluteOffset: 53,
            submatches: [{ start: 8, end: 33, text: 'System.out.println("hi");' }],
          },
        ],
      },
    });
  });

  it('should return no results without error for an absent string', async () => {
    const outcome = await context.router.route({
      projectName: 'hello',
      searchType: 'literal',
      query: 'System.out.println("absent");',
    });

    expect(outcome).toEqual({
      ok: true,
      response: { searchType: 'literal', results: [], message: 'No literal matches' },
    });
  });

  it('should resolve a dotted path against the structural index', async () => {
    const indexPath = structuralIndexPathFor(context.config.structural.indexDir, 'demo');
    mkdirSync(context.config.structural.indexDir, { recursive: true });
    const type = getScipIndexType();
    writeFileSync(
      indexPath,
      type
        .encode(
          type.fromObject({
            documents: [
              {
                relativePath: MAIN_JAVA,
                occurrences: [
                  { symbol: 'semanticdb maven . . com/example/Main#', symbolRoles: 1, range: [4, 13, 17] },
                  { symbol: 'semanticdb maven . . com/example/Main#greet().', symbolRoles: 1, range: [11, 25, 30] },
                  { symbol: 'semanticdb maven . . com/example/Main#greet().', symbolRoles: 0, range: [7, 27, 32] },
                ],
              },
            ],
          })
        )
        .finish()
    );

    const outcome = await context.router.route({
      projectName: 'demo',
      searchType: 'structural',
      query: 'com.example.Main.greet',
    });

    expect(outcome.ok && outcome.response.results).toEqual([
      {
        symbol: 'semanticdb maven . . com/example/Main#greet().',
        filePath: join(root, MAIN_JAVA),
        startLine: 12,
        startChar: 26,
        endLine: 12,
        endChar: 31,
      },
    ]);
  });
});
