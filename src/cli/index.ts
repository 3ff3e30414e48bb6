#!/usr/bin/env node
/**
 * Fathom CLI entry point
 *
 * Command-line interface for registering projects, indexing them and
 * searching them.
 */

import { Command } from 'commander';
import { registerProjectCommands } from './commands/projects.js';
import { registerDepsCommand } from './commands/deps.js';
import { registerIndexCommands } from './commands/index.js';
import { registerSearchCommand } from './commands/search.js';
import { registerServeCommand } from './commands/serve.js';

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('fathom')
    .description('Semantic, literal and structural search over Java projects')
    .version('0.1.0');

  registerProjectCommands(program);
  registerDepsCommand(program);
  registerIndexCommands(program);
  registerSearchCommand(program);
  registerServeCommand(program);

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander handles most errors, but catch any unexpected ones
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

void main();
