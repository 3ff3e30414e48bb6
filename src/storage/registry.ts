/**
 * SQLite project registry for Fathom
 *
 * Maps a unique project name to a canonical root path and the time of its
 * last semantic index run. Every operation is a single statement, so each
 * registry entry is mutated atomically.
 */

import Database, { type Database as DatabaseType, type Statement } from 'better-sqlite3';
import { resolve, dirname } from 'node:path';
import { mkdirSync, existsSync, realpathSync } from 'node:fs';
import {
  type ProjectRecord,
  type ProjectRow,
  RegistryError,
  RegistryErrorCode,
} from './types.js';

/**
 * Schema version for migrations
 */
const SCHEMA_VERSION = 1;

const CREATE_TABLES = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY
);

-- Project registry
CREATE TABLE IF NOT EXISTS projects (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  path TEXT NOT NULL,
  last_indexed_at TEXT
);
`;

function toRecord(row: ProjectRow): ProjectRecord {
  return {
    id: row.id,
    name: row.name,
    path: row.path,
    lastIndexedAt: row.last_indexed_at,
  };
}

/**
 * Canonicalize a project path: absolute, symlinks resolved where the path
 * exists, no trailing separator.
 */
export function canonicalizePath(path: string): string {
  const absolute = resolve(path);
  try {
    return realpathSync.native(absolute);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return absolute;
    }
    throw new RegistryError(
      `Cannot canonicalize path: ${path}`,
      RegistryErrorCode.INVALID_PATH,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Project registry
 */
export class ProjectRegistry {
  private closed = false;
  private readonly insertStmt: Statement<[string, string]>;
  private readonly findStmt: Statement<[string], ProjectRow>;
  private readonly listStmt: Statement<[], ProjectRow>;
  private readonly touchStmt: Statement<[string, string]>;
  private readonly removeStmt: Statement<[string]>;

  private constructor(private readonly db: DatabaseType) {
    this.insertStmt = db.prepare<[string, string]>(
      'INSERT INTO projects (name, path) VALUES (?, ?)'
    );
    this.findStmt = db.prepare<[string], ProjectRow>(
      'SELECT id, name, path, last_indexed_at FROM projects WHERE name = ?'
    );
    this.listStmt = db.prepare<[], ProjectRow>(
      'SELECT id, name, path, last_indexed_at FROM projects ORDER BY name'
    );
    this.touchStmt = db.prepare<[string, string]>(
      'UPDATE projects SET last_indexed_at = ? WHERE name = ?'
    );
    this.removeStmt = db.prepare<[string]>('DELETE FROM projects WHERE name = ?');
  }

  /**
   * Create and initialize a registry
   *
   * @param databasePath - Path to SQLite database file, or ':memory:'
   */
  static create(databasePath: string): ProjectRegistry {
    const inMemory = databasePath === ':memory:';
    const absolutePath = inMemory ? databasePath : resolve(databasePath);

    if (!inMemory) {
      const parentDir = dirname(absolutePath);
      if (!existsSync(parentDir)) {
        mkdirSync(parentDir, { recursive: true });
      }
    }

    try {
      const db = new Database(absolutePath);
      if (!inMemory) {
        db.pragma('journal_mode = WAL');
      }
      db.exec(CREATE_TABLES);

      const versionResult = db
        .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
        .get();
      if (versionResult === undefined) {
        db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
      }

      return new ProjectRegistry(db);
    } catch (error) {
      throw new RegistryError(
        `Failed to initialize registry at ${absolutePath}`,
        RegistryErrorCode.INIT_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Register a project under a unique name
   *
   * @returns The new project's id
   * @throws RegistryError DUPLICATE_NAME if the name exists; nothing is written
   */
  register(name: string, path: string): number {
    const canonical = canonicalizePath(path);

    try {
      const info = this.insertStmt.run(name, canonical);
      return Number(info.lastInsertRowid);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (message.includes('UNIQUE constraint failed')) {
        throw new RegistryError(
          `Project already registered: ${name}`,
          RegistryErrorCode.DUPLICATE_NAME,
          error instanceof Error ? error : undefined
        );
      }
      throw new RegistryError(
        `Failed to register project: ${name}`,
        RegistryErrorCode.QUERY_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Look up a project, returning null when it is not registered
   */
  find(name: string): ProjectRecord | null {
    const row = this.findStmt.get(name);
    return row === undefined ? null : toRecord(row);
  }

  /**
   * Resolve a project name to its root path
   *
   * @throws RegistryError PROJECT_NOT_FOUND
   */
  resolve(name: string): string {
    return this.get(name).path;
  }

  /**
   * Get a project record
   *
   * @throws RegistryError PROJECT_NOT_FOUND
   */
  get(name: string): ProjectRecord {
    const project = this.find(name);
    if (project === null) {
      throw new RegistryError(
        `Project not found: ${name}`,
        RegistryErrorCode.PROJECT_NOT_FOUND
      );
    }
    return project;
  }

  /**
   * All projects, sorted by name
   */
  list(): ProjectRecord[] {
    return this.listStmt.all().map(toRecord);
  }

  /**
   * Record that a semantic index run completed
   *
   * @throws RegistryError PROJECT_NOT_FOUND
   */
  touch(name: string, at: Date = new Date()): void {
    const info = this.touchStmt.run(at.toISOString(), name);
    if (info.changes === 0) {
      throw new RegistryError(
        `Project not found: ${name}`,
        RegistryErrorCode.PROJECT_NOT_FOUND
      );
    }
  }

  /**
   * Remove a project. Removing an unknown name is not an error.
   *
   * @returns Whether a project was removed
   */
  remove(name: string): boolean {
    return this.removeStmt.run(name).changes > 0;
  }

  close(): void {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }
}
