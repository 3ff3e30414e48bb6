/**
 * CLI commands: index, index-scip
 *
 * Build a project's semantic index or its structural (SCIP) index.
 */

import { Command } from 'commander';
import { withContext } from '../../app/context.js';
import { IndexerError, IndexerErrorCode } from '../../indexer/types.js';
import { formatBuildOutcome, formatIndexResult } from '../output.js';
import { createProgressDisplay } from '../progress.js';
import { AgentErrors, CLIError, ExitCode, handleError } from '../errors.js';

interface IndexOptions {
  json?: boolean;
  quiet?: boolean;
  rebuild?: boolean;
}

interface IndexScipOptions {
  json?: boolean;
}

function lockedError(name: string, error: unknown): unknown {
  if (error instanceof IndexerError && error.code === IndexerErrorCode.INDEXING_IN_PROGRESS) {
    return CLIError.withAgentInfo(AgentErrors.indexingInProgress(name), ExitCode.LOCKED, error);
  }
  return error;
}

/**
 * Abort on the first Ctrl-C so the run stops between files
 */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onInterrupt);
    },
  };
}

async function executeIndex(name: string, options: IndexOptions): Promise<void> {
  const isJson = options.json === true;
  const progress = createProgressDisplay({ json: isJson, quiet: options.quiet === true });
  const interrupt = interruptSignal();

  try {
    const result = await withContext(async (context) =>
      context.indexer.runIndex(name, {
        signal: interrupt.signal,
        rebuild: options.rebuild === true,
        onProgress: progress.createCallback(),
      })
    );
    progress.finish();

    formatIndexResult(result, { json: isJson });
    if (result.status === 'project-not-found') {
      process.exitCode = ExitCode.NOT_FOUND;
    }
  } catch (error) {
    progress.finish();
    handleError(lockedError(name, error), isJson);
  } finally {
    interrupt.dispose();
  }
}

async function executeIndexScip(name: string, options: IndexScipOptions): Promise<void> {
  const isJson = options.json === true;
  const interrupt = interruptSignal();

  try {
    const outcome = await withContext(async (context) =>
      context.structuralBuilder.buildStructuralIndex(name, { signal: interrupt.signal })
    );

    formatBuildOutcome(outcome, { json: isJson });
    switch (outcome.kind) {
      case 'built':
        break;
      case 'project-not-found':
      case 'project-path-missing':
        process.exitCode = ExitCode.NOT_FOUND;
        break;
      case 'tool-missing':
        process.exitCode = ExitCode.BACKEND_UNAVAILABLE;
        break;
      default:
        process.exitCode = ExitCode.GENERAL_ERROR;
    }
  } catch (error) {
    handleError(lockedError(name, error), isJson);
  } finally {
    interrupt.dispose();
  }
}

/**
 * Register the index commands with the program
 */
export function registerIndexCommands(program: Command): void {
  program
    .command('index <name>')
    .description('Build the semantic index of a registered project')
    .option('--rebuild', 'Drop the existing collection before indexing')
    .option('--json', 'Output in JSON format')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (name: string, options: IndexOptions) => {
      await executeIndex(name, options);
    });

  program
    .command('index-scip <name>')
    .description('Build the structural (SCIP) index of a registered project with scip-java')
    .option('--json', 'Output in JSON format')
    .action(async (name: string, options: IndexScipOptions) => {
      await executeIndexScip(name, options);
    });
}
