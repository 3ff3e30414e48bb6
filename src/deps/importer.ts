/**
 * Dependency source import
 *
 * Finds `*-sources.jar` files in a local Maven repository, unpacks each one
 * into its own directory and registers that directory as a `dep_<artifact>`
 * project, so library sources can be indexed and searched like any other
 * project. Jars already unpacked are skipped; a corrupt jar is reported and
 * the rest are still imported.
 */

import AdmZip from 'adm-zip';
import { access, mkdir, readdir, rename, rm } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { DependenciesConfig } from '../config/schema.js';
import { createChildLogger, type FathomLogger } from '../logging/logger.js';
import { canonicalizePath, type ProjectRegistry } from '../storage/registry.js';

const SOURCES_JAR_SUFFIX = '-sources.jar';

export type DependencyImport =
  | { kind: 'imported'; name: string; jarPath: string; path: string }
  | { kind: 'skipped'; name: string; jarPath: string; path: string; registered: boolean }
  | { kind: 'failed'; name: string; jarPath: string; error: string };

export interface DependencyImportResult {
  cacheDir: string;
  jarsFound: number;
  imports: DependencyImport[];
}

/**
 * Project name for a sources jar: `commons-lang3-3.12.0-sources.jar` →
 * `dep_commons-lang3-3.12.0`
 */
export function dependencyProjectName(jarPath: string): string {
  return `dep_${basename(jarPath, '.jar').replace(/-sources$/, '')}`;
}

/**
 * Every `*-sources.jar` under a directory, sorted
 *
 * A missing directory yields no jars.
 */
export async function findSourceJars(cacheDir: string): Promise<string[]> {
  const root = resolve(cacheDir);
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(path);
      } else if (entry.isFile() && entry.name.endsWith(SOURCES_JAR_SUFFIX)) {
        found.push(path);
      }
    }
  }

  try {
    await walk(root);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return found.sort();
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DependencyImporter {
  private readonly logger: FathomLogger;

  constructor(
    private readonly registry: ProjectRegistry,
    private readonly config: DependenciesConfig,
    logger: FathomLogger
  ) {
    this.logger = createChildLogger(logger, { component: 'dependencies' });
  }

  /**
   * Scan the configured cache and import every sources jar found
   */
  async importAll(
    options: { onImport?: (result: DependencyImport) => void } = {}
  ): Promise<DependencyImportResult> {
    const cacheDir = resolve(this.config.cacheDir);
    const jars = await findSourceJars(cacheDir);
    this.logger.info({ cacheDir, jars: jars.length }, 'Found source jars');

    const imports: DependencyImport[] = [];
    for (const jarPath of jars) {
      const result = await this.importJar(jarPath);
      imports.push(result);
      options.onImport?.(result);
    }

    return { cacheDir, jarsFound: jars.length, imports };
  }

  /**
   * Unpack one jar and register it
   *
   * The jar is unpacked into a temporary sibling directory that is renamed
   * into place only after extraction succeeds.
   */
  async importJar(jarPath: string): Promise<DependencyImport> {
    const name = dependencyProjectName(jarPath);
    const extractDir = resolve(this.config.extractDir);
    const path = join(extractDir, name);

    if (await exists(path)) {
      const registered = this.ensureRegistered(name, path);
      if (registered.kind === 'failed') {
        return { kind: 'failed', name, jarPath, error: registered.error };
      }
      this.logger.debug({ name, path }, 'Dependency already extracted');
      return {
        kind: 'skipped',
        name,
        jarPath,
        path: this.registry.resolve(name),
        registered: registered.kind === 'registered',
      };
    }

    const existing = this.registry.find(name);
    if (existing !== null) {
      return {
        kind: 'failed',
        name,
        jarPath,
        error: `Project ${name} is already registered at ${existing.path}`,
      };
    }

    const staging = join(extractDir, `.${name}.partial`);
    try {
      await mkdir(extractDir, { recursive: true });
      await rm(staging, { recursive: true, force: true });
      new AdmZip(jarPath).extractAllTo(staging, true);
      await rename(staging, path);
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      this.logger.warn({ jarPath, err: error }, 'Could not extract sources jar');
      return { kind: 'failed', name, jarPath, error: errorMessage(error) };
    }

    this.registry.register(name, path);
    this.logger.info({ name, path }, 'Dependency sources imported');
    return { kind: 'imported', name, jarPath, path: this.registry.resolve(name) };
  }

  private ensureRegistered(
    name: string,
    path: string
  ): { kind: 'present' } | { kind: 'registered' } | { kind: 'failed'; error: string } {
    const existing = this.registry.find(name);
    if (existing === null) {
      this.registry.register(name, path);
      return { kind: 'registered' };
    }
    if (existing.path !== canonicalizePath(path)) {
      return {
        kind: 'failed',
        error: `Project ${name} is already registered at ${existing.path}`,
      };
    }
    return { kind: 'present' };
  }
}
