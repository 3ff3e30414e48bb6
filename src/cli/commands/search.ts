/**
 * CLI command: search
 *
 * Query a registered project semantically, literally or structurally.
 */

import { Command, Option } from 'commander';
import { withContext } from '../../app/context.js';
import { SEARCH_TYPES, type SearchType } from '../../search/types.js';
import { formatSearchResponse } from '../output.js';
import { InvalidArgumentError, handleError, searchFailureToCLIError } from '../errors.js';

interface SearchOptions {
  type: string;
  topK?: string;
  json?: boolean;
  quiet?: boolean;
}

function isSearchType(value: string): value is SearchType {
  return SEARCH_TYPES.some((t) => t === value);
}

function parseTopK(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`--top-k must be a positive integer, got ${value}`);
  }
  return parsed;
}

async function executeSearch(name: string, query: string, options: SearchOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    if (!isSearchType(options.type)) {
      throw new InvalidArgumentError(
        `Unknown search type: ${options.type} (expected ${SEARCH_TYPES.join(', ')})`
      );
    }
    const searchType = options.type;
    const topK = parseTopK(options.topK);

    const outcome = await withContext(async (context) =>
      context.router.route({
        projectName: name,
        searchType,
        query,
        ...(topK !== undefined ? { topK } : {}),
      })
    );

    if (!outcome.ok) {
      throw searchFailureToCLIError(outcome.error);
    }
    formatSearchResponse(outcome.response, { json: isJson, quiet: options.quiet === true });
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the search command with the program
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search <name> <query>')
    .description('Search a registered project')
    .addOption(
      new Option('-t, --type <type>', 'Search modality')
        .choices([...SEARCH_TYPES])
        .default('semantic')
    )
    .option('-k, --top-k <n>', 'Number of semantic results')
    .option('--json', 'Output in JSON format')
    .option('-q, --quiet', 'Print locations only')
    .action(async (name: string, query: string, options: SearchOptions) => {
      await executeSearch(name, query, options);
    });
}
