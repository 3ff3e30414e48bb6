/**
 * CLI command: serve
 *
 * Run the MCP server over stdio. Stdout carries the protocol, so logs go to
 * stderr.
 */

import { Command } from 'commander';
import { startMCPServer } from '../../mcp/server.js';
import { handleError } from '../errors.js';

interface ServeOptions {
  json?: boolean;
}

async function executeServe(options: ServeOptions): Promise<void> {
  try {
    await startMCPServer({ logStream: 'stderr' });
  } catch (error) {
    handleError(error, options.json === true);
  }
}

/**
 * Register the serve command with the program
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the MCP server on stdio')
    .option('--json', 'Output errors in JSON format')
    .action(async (options: ServeOptions) => {
      await executeServe(options);
    });
}
