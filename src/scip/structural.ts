/**
 * Structural search over a SCIP index
 *
 * Finds the definitions of a method named by a dotted query. SCIP symbols
 * carry a scheme, package manager, package name and version before the
 * descriptor, so matching is by descriptor suffix.
 */

import { join } from 'node:path';
import { createChildLogger, type FathomLogger } from '../logging/logger.js';
import type { StructuralMatch } from '../search/types.js';
import { loadScipIndex } from './loader.js';
import { decodeRange } from './range.js';
import { parseSymbolQuery, type SymbolQueryRejection } from './symbol-query.js';
import { type ScipIndex, ScipIndexError, ScipIndexErrorCode, SymbolRole } from './types.js';

export type StructuralOutcome =
  | { kind: 'ok'; matches: StructuralMatch[] }
  | { kind: 'invalid-query'; query: string; reason: SymbolQueryRejection }
  | { kind: 'index-not-found'; indexPath: string };

/**
 * Every Definition occurrence whose symbol ends with `suffix`, in index order
 *
 * Output positions are 1-based. Occurrences with a malformed range are
 * skipped and counted.
 */
export function findDefinitions(
  index: ScipIndex,
  projectRoot: string,
  suffix: string
): { matches: StructuralMatch[]; skippedRanges: number } {
  const matches: StructuralMatch[] = [];
  let skippedRanges = 0;

  for (const document of index.documents) {
    for (const occurrence of document.occurrences) {
      if ((occurrence.symbolRoles & SymbolRole.Definition) === 0) continue;
      if (!occurrence.symbol.endsWith(suffix)) continue;

      const range = decodeRange(occurrence.range);
      if (range === null) {
        skippedRanges++;
        continue;
      }

      matches.push({
        symbol: occurrence.symbol,
        filePath: join(projectRoot, document.relativePath),
        startLine: range.startLine + 1,
        startChar: range.startChar + 1,
        endLine: range.endLine + 1,
        endChar: range.endChar + 1,
      });
    }
  }

  return { matches, skippedRanges };
}

export class StructuralSearchEngine {
  private readonly logger: FathomLogger;

  constructor(logger: FathomLogger) {
    this.logger = createChildLogger(logger, { component: 'structural-search' });
  }

  /**
   * Look up the definitions of `dottedQuery` (e.g. `com.example.Main.greet`)
   *
   * The index is read on every call. Overloaded methods share a suffix and
   * are all returned, unranked.
   */
  async search(
    indexPath: string,
    projectRoot: string,
    dottedQuery: string
  ): Promise<StructuralOutcome> {
    const parsed = parseSymbolQuery(dottedQuery);
    if (!parsed.ok) {
      this.logger.warn(
        { query: dottedQuery, reason: parsed.reason },
        'Query cannot be resolved to a symbol'
      );
      return { kind: 'invalid-query', query: dottedQuery, reason: parsed.reason };
    }

    let index: ScipIndex;
    try {
      index = await loadScipIndex(indexPath);
    } catch (error) {
      if (error instanceof ScipIndexError && error.code === ScipIndexErrorCode.NOT_FOUND) {
        return { kind: 'index-not-found', indexPath };
      }
      throw error;
    }

    if (index.malformedRecords > 0) {
      this.logger.warn(
        { indexPath, malformedRecords: index.malformedRecords },
        'Skipped malformed index records'
      );
    }

    const { matches, skippedRanges } = findDefinitions(index, projectRoot, parsed.query.suffix);
    if (skippedRanges > 0) {
      this.logger.warn({ indexPath, skippedRanges }, 'Skipped occurrences with malformed ranges');
    }

    this.logger.debug(
      { query: dottedQuery, suffix: parsed.query.suffix, matches: matches.length },
      'Structural search completed'
    );
    return { kind: 'ok', matches };
  }
}
