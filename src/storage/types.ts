/**
 * Storage types for Fathom
 */

/**
 * Registered project
 */
export interface ProjectRecord {
  /** Surrogate key assigned on registration */
  id: number;
  /** Unique external lookup key */
  name: string;
  /** Canonical absolute path of the project root */
  path: string;
  /** ISO-8601 timestamp of the last completed semantic index run */
  lastIndexedAt: string | null;
}

/**
 * Registry row as stored in SQLite
 */
export interface ProjectRow {
  id: number;
  name: string;
  path: string;
  last_indexed_at: string | null;
}

/**
 * Registry error codes
 */
export enum RegistryErrorCode {
  /** Database initialization failed */
  INIT_FAILED = 'INIT_FAILED',
  /** A project with this name is already registered */
  DUPLICATE_NAME = 'DUPLICATE_NAME',
  /** No project with this name */
  PROJECT_NOT_FOUND = 'PROJECT_NOT_FOUND',
  /** The path to register could not be canonicalized */
  INVALID_PATH = 'INVALID_PATH',
  /** Query execution failed */
  QUERY_FAILED = 'QUERY_FAILED',
}

/**
 * Registry error
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: RegistryErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

/**
 * Narrow an unknown error to a registry not-found error
 */
export function isProjectNotFound(error: unknown): error is RegistryError {
  return error instanceof RegistryError && error.code === RegistryErrorCode.PROJECT_NOT_FOUND;
}
