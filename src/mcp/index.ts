/**
 * MCP module exports
 */

export * from './types.js';
export * from './server.js';
export { handleSearch } from './tools/search.js';
export { handleListProjects } from './tools/projects.js';
export { handleIndexProject } from './tools/index.js';
