import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { discoverSourceFiles, extractProjectSnippets } from '../../../src/parser/discovery.js';
import { ParserError } from '../../../src/parser/types.js';

const OPTIONS = {
  extensions: ['.java'],
  excludePatterns: ['**/build/**', '**/*Generated.java'],
};

function write(root: string, relativePath: string, content: string): void {
  const path = join(root, relativePath);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

describe('discoverSourceFiles', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'fathom-discovery-'));
    write(root, 'src/b/B.java', 'class B { void b() {} }');
    write(root, 'src/a/A.java', 'class A { void a() {} }');
    write(root, 'src/a/notes.txt', 'not java');
    write(root, 'build/out/C.java', 'class C { void c() {} }');
    write(root, 'src/a/ThingGenerated.java', 'class ThingGenerated { void g() {} }');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should list matching files as sorted relative paths', async () => {
    const files = await discoverSourceFiles(root, OPTIONS);

    expect(files).toEqual(['src/a/A.java', 'src/b/B.java']);
  });

  it('should throw DISCOVERY_FAILED for a missing root', async () => {
    await expect(discoverSourceFiles(join(root, 'missing'), OPTIONS)).rejects.toThrow(ParserError);
  });

  it('should yield snippets from every file in order', async () => {
    const names: string[] = [];
    for await (const snippet of extractProjectSnippets(root, OPTIONS)) {
      names.push(`${snippet.filePath}:${snippet.methodName}`);
    }

    expect(names).toEqual(['src/a/A.java:a', 'src/b/B.java:b']);
  });
});
