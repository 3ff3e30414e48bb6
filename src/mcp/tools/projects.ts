/**
 * MCP tool: list_projects
 */

import type { ProjectRegistry } from '../../storage/registry.js';
import type { ListProjectsOutput } from '../types.js';

/**
 * Handle list_projects tool call
 */
export function handleListProjects(registry: ProjectRegistry): ListProjectsOutput {
  return {
    projects: registry.list().map((project) => ({
      name: project.name,
      path: project.path,
      last_indexed_at: project.lastIndexedAt,
    })),
  };
}
