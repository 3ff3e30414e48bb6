/**
 * MCP Server for Fathom
 *
 * Exposes project search and indexing via MCP protocol over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import type { ZodError } from 'zod';

import { createAppContext, type AppContext, type CreateContextOptions } from '../app/context.js';
import { SEARCH_TYPES } from '../search/types.js';
import { handleIndexProject } from './tools/index.js';
import { handleListProjects } from './tools/projects.js';
import { handleSearch } from './tools/search.js';
import {
  IndexProjectInputSchema,
  SearchInputSchema,
  type ToolCallResult,
  type ToolError,
  type ToolOutcome,
} from './types.js';

/**
 * MCP tool definitions
 */
export const TOOLS = [
  {
    name: 'search',
    description:
      'Search a registered Java project. "semantic" ranks methods by meaning, "literal" finds exact text with ripgrep, "structural" finds definitions of a dotted symbol path such as com.example.Main.greet.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        project_name: {
          type: 'string',
          description: 'Name the project was registered under',
        },
        query: {
          type: 'string',
          description: 'Natural language text, literal pattern, or dotted symbol path',
        },
        search_type: {
          type: 'string',
          enum: [...SEARCH_TYPES],
          description: 'Search modality',
        },
        top_k: {
          type: 'number',
          description: 'Number of semantic results (default: 5)',
        },
      },
      required: ['project_name', 'query', 'search_type'],
    },
  },
  {
    name: 'list_projects',
    description: 'List all registered projects with their last indexing time.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
      required: [],
    },
  },
  {
    name: 'index_project',
    description:
      'Extract and embed every method of a registered project. Optionally also build the structural index with scip-java.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        project_name: {
          type: 'string',
          description: 'Name the project was registered under',
        },
        rebuild: {
          type: 'boolean',
          description: 'Drop the existing collection before indexing',
        },
        structural: {
          type: 'boolean',
          description: 'Also build the structural (SCIP) index',
        },
      },
      required: ['project_name'],
    },
  },
];

function textResult(value: unknown, isError = false): ToolCallResult {
  const result: ToolCallResult = {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

function fromOutcome<T>(outcome: ToolOutcome<T>): ToolCallResult {
  return outcome.ok ? textResult(outcome.value) : textResult(outcome.error, true);
}

function invalidInput(tool: string, error: ZodError): ToolCallResult {
  const body: ToolError = {
    error: {
      code: 'INVALID_INPUT',
      message: `Invalid input for ${tool}`,
      detail: error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    },
  };
  return textResult(body, true);
}

/**
 * Dispatch one tool call. Never throws: failures come back with isError.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  context: AppContext
): Promise<ToolCallResult> {
  try {
    switch (name) {
      case 'search': {
        const parsed = SearchInputSchema.safeParse(args ?? {});
        if (!parsed.success) return invalidInput(name, parsed.error);
        return fromOutcome(await handleSearch(parsed.data, context.router));
      }

      case 'list_projects':
        return textResult(handleListProjects(context.registry));

      case 'index_project': {
        const parsed = IndexProjectInputSchema.safeParse(args ?? {});
        if (!parsed.success) return invalidInput(name, parsed.error);
        return fromOutcome(
          await handleIndexProject(parsed.data, context.indexer, context.structuralBuilder)
        );
      }

      default:
        return textResult(
          {
            error: {
              code: 'UNKNOWN_TOOL',
              message: `Unknown tool: ${name}`,
            },
          },
          true
        );
    }
  } catch (error) {
    context.logger.error({ tool: name, err: error }, 'Tool call failed');
    return textResult(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: error instanceof Error ? error.message : String(error),
        },
      },
      true
    );
  }
}

/**
 * Create an MCP server bound to a context
 */
export function createMCPServer(context: AppContext): Server {
  const server = new Server(
    {
      name: 'fathom',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: TOOLS,
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args, context);
  });

  return server;
}

/**
 * Start the MCP server with stdio transport
 */
export async function startMCPServer(options: CreateContextOptions = {}): Promise<void> {
  const context = createAppContext({ logStream: 'stderr', ...options });
  const server = createMCPServer(context);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  context.logger.info('MCP server listening on stdio');

  const shutdown = (): void => {
    void server
      .close()
      .then(() => context.close())
      .then(() => process.exit(0));
  };

  // Handle graceful shutdown
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
