/**
 * Source discovery and project-wide extraction
 */

import { readdir, readFile } from 'node:fs/promises';
import { extname, join, posix } from 'node:path';
import { minimatch } from 'minimatch';
import { extractSnippets } from './extractor.js';
import {
  type DiscoveryOptions,
  type FileExtraction,
  type Snippet,
  ParserError,
  ParserErrorCode,
} from './types.js';

const MATCH_OPTIONS = { dot: true } as const;

/**
 * Compiled exclusion rules
 *
 * Patterns of the form `<dir-glob>/**` also prune whole directories so the
 * walk never descends into them.
 */
class ExclusionRules {
  private readonly patterns: readonly string[];
  private readonly directoryPatterns: readonly string[];

  constructor(patterns: readonly string[]) {
    this.patterns = patterns;
    this.directoryPatterns = patterns
      .filter((p) => p.endsWith('/**'))
      .map((p) => p.slice(0, -'/**'.length));
  }

  excludesFile(relativePath: string): boolean {
    return this.patterns.some((p) => minimatch(relativePath, p, MATCH_OPTIONS));
  }

  excludesDirectory(relativePath: string): boolean {
    return this.directoryPatterns.some((p) => minimatch(relativePath, p, MATCH_OPTIONS));
  }
}

/**
 * Find source files under a project root
 *
 * @returns Project-relative POSIX paths, sorted
 */
export async function discoverSourceFiles(
  root: string,
  options: DiscoveryOptions
): Promise<string[]> {
  const rules = new ExclusionRules(options.excludePatterns);
  const extensions = new Set(options.extensions);
  const found: string[] = [];

  async function walk(relativeDir: string): Promise<void> {
    const entries = await readdir(join(root, relativeDir), { withFileTypes: true });
    for (const entry of entries) {
      const relativePath = relativeDir === '' ? entry.name : posix.join(relativeDir, entry.name);
      if (entry.isDirectory()) {
        if (!rules.excludesDirectory(relativePath)) {
          await walk(relativePath);
        }
      } else if (entry.isFile()) {
        if (extensions.has(extname(entry.name)) && !rules.excludesFile(relativePath)) {
          found.push(relativePath);
        }
      }
    }
  }

  try {
    await walk('');
  } catch (error) {
    throw new ParserError(
      `Failed to scan ${root}: ${error instanceof Error ? error.message : String(error)}`,
      ParserErrorCode.DISCOVERY_FAILED,
      error instanceof Error ? error : undefined
    );
  }

  return found.sort();
}

/**
 * Read and extract each file in turn
 *
 * A file that cannot be read or parsed yields a `failed` entry; the walk
 * carries on with the next file.
 */
export async function* extractFiles(
  root: string,
  relativePaths: readonly string[]
): AsyncGenerator<FileExtraction> {
  for (const relativePath of relativePaths) {
    try {
      const source = await readFile(join(root, relativePath), 'utf8');
      const snippets = await extractSnippets(relativePath, source);
      yield { kind: 'file', relativePath, snippets };
    } catch (error) {
      yield {
        kind: 'failed',
        relativePath,
        error: new ParserError(
          `Failed to extract ${relativePath}: ${error instanceof Error ? error.message : String(error)}`,
          ParserErrorCode.PARSE_FAILED,
          error instanceof Error ? error : undefined
        ),
      };
    }
  }
}

/**
 * Lazily yield every snippet of a project
 *
 * Files that fail to extract are passed to `onFailure` and contribute no
 * snippets.
 */
export async function* extractProjectSnippets(
  root: string,
  options: DiscoveryOptions & { onFailure?: (failure: Extract<FileExtraction, { kind: 'failed' }>) => void }
): AsyncGenerator<Snippet> {
  const files = await discoverSourceFiles(root, options);
  for await (const extraction of extractFiles(root, files)) {
    if (extraction.kind === 'failed') {
      options.onFailure?.(extraction);
      continue;
    }
    yield* extraction.snippets;
  }
}
