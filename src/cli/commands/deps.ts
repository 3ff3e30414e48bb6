/**
 * CLI command: deps
 *
 * Import dependency sources from the local Maven repository as projects.
 */

import { Command } from 'commander';
import { withContext } from '../../app/context.js';
import { formatDependencyImport } from '../output.js';
import { handleError } from '../errors.js';

interface DepsOptions {
  cacheDir?: string;
  extractDir?: string;
  json?: boolean;
}

async function executeDeps(options: DepsOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const result = await withContext(async (context) => context.dependencies.importAll(), {
      overrides: {
        dependencies: {
          ...(options.cacheDir !== undefined ? { cacheDir: options.cacheDir } : {}),
          ...(options.extractDir !== undefined ? { extractDir: options.extractDir } : {}),
        },
      },
    });

    formatDependencyImport(result, { json: isJson });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the deps command with the program
 */
export function registerDepsCommand(program: Command): void {
  program
    .command('deps')
    .description('Unpack *-sources.jar files from the Maven cache and register each as a project')
    .option('--cache-dir <dir>', 'Directory to scan for source jars (default: ~/.m2/repository)')
    .option('--extract-dir <dir>', 'Directory to unpack into')
    .option('--json', 'Output in JSON format')
    .action(async (options: DepsOptions) => {
      await executeDeps(options);
    });
}
