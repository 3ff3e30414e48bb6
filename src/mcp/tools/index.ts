/**
 * MCP tool: index_project
 *
 * Builds the semantic index of a registered project and, on request, its
 * structural index as well.
 */

import type { Indexer } from '../../indexer/indexer.js';
import { IndexerError } from '../../indexer/types.js';
import type { BuildOutcome, StructuralIndexBuilder } from '../../scip/builder.js';
import type { IndexProjectInput, IndexProjectOutput, ToolOutcome } from '../types.js';

function describeBuild(outcome: BuildOutcome): NonNullable<IndexProjectOutput['structural']> {
  switch (outcome.kind) {
    case 'built':
      return { status: 'built', index_path: outcome.indexPath };
    case 'project-not-found':
      return { status: 'project-not-found' };
    case 'project-path-missing':
      return { status: 'project-path-missing', detail: `${outcome.path} does not exist` };
    case 'tool-missing':
      return { status: 'tool-missing', detail: `${outcome.command} not found on the PATH` };
    case 'tool-error':
      return { status: 'tool-error', detail: outcome.stderr };
    case 'timeout':
      return { status: 'timeout', detail: `timed out after ${outcome.timeoutMs}ms` };
    case 'aborted':
      return { status: 'aborted' };
  }
}

/**
 * Handle index_project tool call
 */
export async function handleIndexProject(
  input: IndexProjectInput,
  indexer: Indexer,
  structuralBuilder: StructuralIndexBuilder
): Promise<ToolOutcome<IndexProjectOutput>> {
  const name = input.project_name;

  try {
    const result = await indexer.runIndex(name, { rebuild: input.rebuild === true });

    if (result.status === 'project-not-found') {
      return {
        ok: false,
        error: { error: { code: 'PROJECT_NOT_FOUND', message: `Project not found: ${name}` } },
      };
    }

    const output: IndexProjectOutput =
      result.status === 'indexed'
        ? {
            project_name: name,
            status: 'indexed',
            files_processed: result.filesProcessed,
            files_skipped: result.filesSkipped,
            snippets_indexed: result.snippetsIndexed,
            orphans_pruned: result.orphansPruned,
            duration_ms: result.durationMs,
          }
        : { project_name: name, status: 'no-source-files' };

    if (input.structural === true) {
      output.structural = describeBuild(await structuralBuilder.buildStructuralIndex(name));
    }

    return { ok: true, value: output };
  } catch (error) {
    if (error instanceof IndexerError) {
      return { ok: false, error: { error: { code: error.code, message: error.message } } };
    }
    throw error;
  }
}
