/**
 * CLI commands: add, remove, list
 *
 * Manage the project registry.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { withContext } from '../../app/context.js';
import { RegistryError, RegistryErrorCode } from '../../storage/types.js';
import { formatProjectList } from '../output.js';
import { AgentErrors, CLIError, ExitCode, InvalidArgumentError, handleError } from '../errors.js';

interface JsonOption {
  json?: boolean;
}

/**
 * Reject paths that do not exist or are not directories
 */
async function assertDirectory(path: string): Promise<string> {
  const absolute = resolve(path);
  try {
    const info = await stat(absolute);
    if (!info.isDirectory()) {
      throw new InvalidArgumentError(`Not a directory: ${absolute}`);
    }
    return absolute;
  } catch (error) {
    if (error instanceof CLIError) throw error;
    throw new InvalidArgumentError(
      `Path does not exist: ${absolute}`,
      error instanceof Error ? error : undefined
    );
  }
}

async function executeAdd(name: string, path: string, options: JsonOption): Promise<void> {
  const isJson = options.json === true;

  try {
    const directory = await assertDirectory(path);
    const project = await withContext(async (context) => {
      try {
        context.registry.register(name, directory);
      } catch (error) {
        if (error instanceof RegistryError && error.code === RegistryErrorCode.DUPLICATE_NAME) {
          throw CLIError.withAgentInfo(
            AgentErrors.duplicateProject(name),
            ExitCode.INVALID_ARGS,
            error
          );
        }
        throw error;
      }
      return context.registry.get(name);
    });

    if (isJson) {
      console.log(JSON.stringify(project, null, 2));
    } else {
      console.log(chalk.green(`Registered ${chalk.bold(project.name)} at ${project.path}`));
    }
  } catch (error) {
    handleError(error, isJson);
  }
}

async function executeRemove(name: string, options: JsonOption): Promise<void> {
  const isJson = options.json === true;

  try {
    const removed = await withContext(async (context) => context.registry.remove(name));

    if (isJson) {
      console.log(JSON.stringify({ name, removed }, null, 2));
    } else if (removed) {
      console.log(chalk.green(`Removed ${chalk.bold(name)}`));
    } else {
      console.log(chalk.yellow(`No project named ${name}; nothing to remove`));
    }
  } catch (error) {
    handleError(error, isJson);
  }
}

async function executeList(options: JsonOption): Promise<void> {
  const isJson = options.json === true;

  try {
    const projects = await withContext(async (context) => context.registry.list());
    formatProjectList(projects, { json: isJson });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the project registry commands with the program
 */
export function registerProjectCommands(program: Command): void {
  program
    .command('add <name> <path>')
    .description('Register a project directory under a unique name')
    .option('--json', 'Output in JSON format')
    .action(async (name: string, path: string, options: JsonOption) => {
      await executeAdd(name, path, options);
    });

  program
    .command('remove <name>')
    .description('Unregister a project (indexes are left on disk)')
    .option('--json', 'Output in JSON format')
    .action(async (name: string, options: JsonOption) => {
      await executeRemove(name, options);
    });

  program
    .command('list')
    .description('List registered projects')
    .option('--json', 'Output in JSON format')
    .action(async (options: JsonOption) => {
      await executeList(options);
    });
}
