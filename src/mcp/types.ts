/**
 * MCP types for Fathom
 *
 * Tool inputs arrive as untyped JSON, so each one has a zod schema; the
 * inferred types are what the handlers receive.
 */

import { z } from 'zod';
import { SEARCH_TYPES } from '../search/types.js';

/**
 * MCP tool input for search
 */
export const SearchInputSchema = z.object({
  /** Registered project name */
  project_name: z.string().min(1),
  /** Natural language text, literal pattern, or dotted symbol path */
  query: z.string(),
  /** Modality to dispatch to */
  search_type: z.enum(SEARCH_TYPES),
  /** Number of semantic results (default: 5) */
  top_k: z.number().int().positive().optional(),
});

export type SearchInput = z.infer<typeof SearchInputSchema>;

/**
 * MCP tool input for index_project
 */
export const IndexProjectInputSchema = z.object({
  project_name: z.string().min(1),
  /** Drop the existing collection first */
  rebuild: z.boolean().optional(),
  /** Also build the structural (SCIP) index */
  structural: z.boolean().optional(),
});

export type IndexProjectInput = z.infer<typeof IndexProjectInputSchema>;

/**
 * Error body returned with isError
 */
export interface ToolError {
  error: {
    code: string;
    message: string;
    detail?: string;
  };
}

/**
 * MCP tool output for search
 */
export interface SearchOutput {
  search_type: string;
  results: unknown[];
  message: string;
}

/**
 * Project entry in list_projects output
 */
export interface ProjectInfo {
  name: string;
  path: string;
  last_indexed_at: string | null;
}

/**
 * MCP tool output for list_projects
 */
export interface ListProjectsOutput {
  projects: ProjectInfo[];
}

/**
 * MCP tool output for index_project
 */
export interface IndexProjectOutput {
  project_name: string;
  status: string;
  files_processed?: number;
  files_skipped?: number;
  snippets_indexed?: number;
  orphans_pruned?: number;
  duration_ms?: number;
  structural?: {
    status: string;
    index_path?: string;
    detail?: string;
  };
}

/**
 * Handler result: either a payload or an error body
 */
export type ToolOutcome<T> = { ok: true; value: T } | { ok: false; error: ToolError };

/**
 * Text content returned to the MCP client
 */
export interface ToolCallResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}
