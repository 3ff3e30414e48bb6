/**
 * Deterministic storage keys derived from a project name
 *
 * Project names are free-form; collection names, index file names and lock
 * file names are not. The key keeps a readable slug and appends a digest of
 * the exact name, so two names that sanitize to the same slug still differ.
 */

import { createHash } from 'node:crypto';
import { join } from 'node:path';

const MAX_SLUG_LENGTH = 32;
const DIGEST_LENGTH = 12;

/**
 * Lowercase, `[a-z0-9_]` only, runs of `_` collapsed, trimmed
 */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/, '');
  return slug === '' ? 'project' : slug;
}

/**
 * `<slug>_<first 12 hex chars of sha256(name)>`
 */
export function projectKey(name: string): string {
  const digest = createHash('sha256').update(name, 'utf8').digest('hex');
  return `${slugify(name)}_${digest.slice(0, DIGEST_LENGTH)}`;
}

/**
 * Name of the vector collection holding a project's snippets
 */
export function collectionNameFor(projectName: string): string {
  return `snippets_${projectKey(projectName)}`;
}

/**
 * Location of a project's structural index file
 */
export function structuralIndexPathFor(indexDir: string, projectName: string): string {
  return join(indexDir, `${projectKey(projectName)}.scip`);
}
