/**
 * Cross-platform path utilities for Fathom
 *
 * Provides platform-independent paths for data storage.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Application name used for directory naming
 */
const APP_NAME = 'fathom';

/**
 * Get the Fathom data directory
 *
 * - macOS/Linux: ~/.fathom (or $XDG_DATA_HOME/fathom if set)
 * - Windows: %LOCALAPPDATA%\fathom
 *
 * `FATHOM_DATA_DIR` takes precedence on every platform.
 */
export function getDataDir(): string {
  const explicit = process.env.FATHOM_DATA_DIR;
  if (explicit !== undefined && explicit !== '') {
    return explicit;
  }

  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA;
    if (localAppData) {
      return join(localAppData, APP_NAME);
    }
    return join(homedir(), 'AppData', 'Local', APP_NAME);
  }

  const xdgDataHome = process.env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return join(xdgDataHome, APP_NAME);
  }
  return join(homedir(), `.${APP_NAME}`);
}

/**
 * Get a path within the data directory
 */
export function getDataPath(relativePath: string): string {
  return join(getDataDir(), relativePath);
}

/**
 * Path of the project registry database
 */
export function getDefaultDatabasePath(): string {
  return getDataPath('registry.db');
}

/**
 * Path of the sqlite-vec vector database
 */
export function getDefaultVectorDatabasePath(): string {
  return getDataPath('vectors.db');
}

/**
 * Directory that holds one structural index file per project
 */
export function getDefaultStructuralIndexDir(): string {
  return getDataPath(join('indexes', 'scip'));
}

/**
 * Directory that extracted dependency sources are unpacked into
 */
export function getDefaultDependencyDir(): string {
  return getDataPath('deps');
}

/**
 * Local Maven repository scanned for `*-sources.jar` files
 */
export function getDefaultMavenCacheDir(): string {
  return join(homedir(), '.m2', 'repository');
}

/**
 * Directory for cross-process indexing lock files
 */
export function getDefaultLockDir(): string {
  return getDataPath('locks');
}
