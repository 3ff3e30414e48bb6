/**
 * Search router for Fathom
 *
 * Resolves the project once, dispatches on the modality and turns every
 * backend outcome into a SearchOutcome. Nothing a backend throws escapes:
 * unexpected errors become INTERNAL_ERROR with the message kept as detail.
 */

import type { SearchConfig, StructuralConfig } from '../config/schema.js';
import type { SnippetVectorIndex } from '../indexer/vector-index.js';
import { createChildLogger, type FathomLogger } from '../logging/logger.js';
import type { StructuralSearchEngine } from '../scip/structural.js';
import { MIN_QUERY_SEGMENTS } from '../scip/symbol-query.js';
import { structuralIndexPathFor } from '../storage/project-key.js';
import type { ProjectRegistry } from '../storage/registry.js';
import type { LiteralSearchAdapter } from './literal.js';
import {
  type SearchFailure,
  type SearchOutcome,
  type SearchRequest,
  type SearchResponse,
  SearchErrorCode,
} from './types.js';

function failure(code: SearchErrorCode, message: string, detail?: string): SearchOutcome {
  const error: SearchFailure = { code, message };
  if (detail !== undefined) {
    error.detail = detail;
  }
  return { ok: false, error };
}

function success(response: SearchResponse): SearchOutcome {
  return { ok: true, response };
}

function plural(count: number, noun: string): string {
  if (count === 1) return `${count} ${noun}`;
  return `${count} ${noun}${/(s|x|ch|sh)$/.test(noun) ? 'es' : 's'}`;
}

export interface SearchRouterDeps {
  registry: ProjectRegistry;
  vectorIndex: SnippetVectorIndex;
  literal: LiteralSearchAdapter;
  structural: StructuralSearchEngine;
  searchConfig: SearchConfig;
  structuralConfig: StructuralConfig;
  logger: FathomLogger;
}

export class SearchRouter {
  private readonly logger: FathomLogger;

  constructor(private readonly deps: SearchRouterDeps) {
    this.logger = createChildLogger(deps.logger, { component: 'search-router' });
  }

  /**
   * Clamp a requested result count into [1, maxTopK]
   */
  resolveTopK(topK: number | undefined): number {
    const { defaultTopK, maxTopK } = this.deps.searchConfig;
    if (topK === undefined || !Number.isFinite(topK)) {
      return Math.min(defaultTopK, maxTopK);
    }
    return Math.max(1, Math.min(Math.floor(topK), maxTopK));
  }

  async route(request: SearchRequest): Promise<SearchOutcome> {
    const { projectName, searchType, query } = request;

    if (query.trim() === '') {
      return failure(SearchErrorCode.INVALID_QUERY, 'Query must not be empty');
    }

    try {
      const project = this.deps.registry.find(projectName);
      if (project === null) {
        return failure(SearchErrorCode.PROJECT_NOT_FOUND, `Project not found: ${projectName}`);
      }

      switch (searchType) {
        case 'semantic':
          return await this.semantic(projectName, query, this.resolveTopK(request.topK));
        case 'literal':
          return await this.literal(project.path, query, request.signal);
        case 'structural':
          return await this.structural(projectName, project.path, query);
        default: {
          const unknownType: never = searchType;
          return failure(SearchErrorCode.INVALID_QUERY, `Unknown search type: ${String(unknownType)}`);
        }
      }
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.error(
        { err: error, project: projectName, searchType },
        'Search failed with an unexpected error'
      );
      return failure(SearchErrorCode.INTERNAL_ERROR, 'Internal error while searching', detail);
    }
  }

  private async semantic(projectName: string, query: string, topK: number): Promise<SearchOutcome> {
    const outcome = await this.deps.vectorIndex.query(projectName, query, topK);
    if (outcome.kind === 'collection-not-found') {
      return failure(
        SearchErrorCode.NOT_INDEXED,
        `Project ${projectName} has no semantic index; run \`fathom index ${projectName}\``,
        outcome.collection
      );
    }

    return success({
      searchType: 'semantic',
      results: outcome.matches,
      message: `Found ${plural(outcome.matches.length, 'semantic match')}`,
    });
  }

  private async literal(
    projectRoot: string,
    query: string,
    signal: AbortSignal | undefined
  ): Promise<SearchOutcome> {
    const outcome = await this.deps.literal.search(
      projectRoot,
      query,
      signal !== undefined ? { signal } : {}
    );

    switch (outcome.kind) {
      case 'success':
        return success({
          searchType: 'literal',
          results: outcome.matches,
          message: `Found ${plural(outcome.matches.length, 'literal match')}`,
        });
      case 'no-matches':
        return success({ searchType: 'literal', results: [], message: 'No literal matches' });
      case 'tool-missing':
        return failure(
          SearchErrorCode.BACKEND_UNAVAILABLE,
          `Literal search requires \`${outcome.command}\` (ripgrep) on the PATH`
        );
      case 'root-missing':
        return failure(
          SearchErrorCode.PROJECT_PATH_MISSING,
          `Project directory no longer exists: ${outcome.projectRoot}`
        );
      case 'tool-error':
        return failure(
          SearchErrorCode.BACKEND_PROCESS_FAILURE,
          `Literal search failed with exit code ${outcome.exitCode}`,
          outcome.stderr
        );
      case 'timeout':
        return failure(
          SearchErrorCode.BACKEND_TIMEOUT,
          `Literal search timed out after ${outcome.timeoutMs}ms`
        );
      case 'aborted':
        return failure(SearchErrorCode.CANCELLED, 'Literal search was cancelled');
    }
  }

  private async structural(
    projectName: string,
    projectRoot: string,
    query: string
  ): Promise<SearchOutcome> {
    const indexPath = structuralIndexPathFor(this.deps.structuralConfig.indexDir, projectName);
    const outcome = await this.deps.structural.search(indexPath, projectRoot, query);

    switch (outcome.kind) {
      case 'ok':
        return success({
          searchType: 'structural',
          results: outcome.matches,
          message: `Found ${plural(outcome.matches.length, 'definition')}`,
        });
      case 'invalid-query':
        return success({
          searchType: 'structural',
          results: [],
          message:
            outcome.reason === 'too-short'
              ? `Structural queries need at least ${MIN_QUERY_SEGMENTS} dot-separated segments, e.g. com.example.Main.greet`
              : `Structural query ${outcome.query} has an empty segment; remove the doubled, leading or trailing dot`,
        });
      case 'index-not-found':
        return failure(
          SearchErrorCode.NOT_INDEXED,
          `Project ${projectName} has no structural index; run \`fathom index-scip ${projectName}\``,
          outcome.indexPath
        );
    }
  }
}
