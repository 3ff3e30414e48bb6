/**
 * MCP tool: search
 *
 * Routes a query to the semantic, literal or structural backend of a
 * registered project.
 */

import type { SearchRouter } from '../../search/router.js';
import type { SearchInput, SearchOutput, ToolOutcome } from '../types.js';

/**
 * Handle search tool call
 */
export async function handleSearch(
  input: SearchInput,
  router: SearchRouter
): Promise<ToolOutcome<SearchOutput>> {
  const outcome = await router.route({
    projectName: input.project_name,
    searchType: input.search_type,
    query: input.query,
    ...(input.top_k !== undefined ? { topK: input.top_k } : {}),
  });

  if (!outcome.ok) {
    return { ok: false, error: { error: outcome.error } };
  }

  return {
    ok: true,
    value: {
      search_type: outcome.response.searchType,
      results: outcome.response.results,
      message: outcome.response.message,
    },
  };
}
