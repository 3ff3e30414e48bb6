/**
 * Per-project index lock
 *
 * Two layers: an in-process map that fails fast for concurrent calls in the
 * same process, and an advisory lock file so that two CLI processes do not
 * index the same project at once.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import lockfile from 'proper-lockfile';
import type { FathomLogger } from '../logging/logger.js';
import { projectKey } from '../storage/project-key.js';
import { IndexerError, IndexerErrorCode } from './types.js';

/**
 * In-memory lock storage, shared by every ProjectLock in the process
 */
const heldLocks = new Map<string, { operation: string; lockedAt: Date }>();

function isLockedError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ELOCKED';
}

export class ProjectLock {
  constructor(
    private readonly lockDir: string,
    private readonly logger: FathomLogger
  ) {}

  /**
   * Whether this process currently holds the project's lock
   */
  isHeld(projectName: string): boolean {
    return heldLocks.has(projectKey(projectName));
  }

  /**
   * Run `fn` while holding the project's lock
   *
   * @throws IndexerError INDEXING_IN_PROGRESS when the lock is held, here or
   * in another process
   */
  async withLock<T>(projectName: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const key = projectKey(projectName);
    const held = heldLocks.get(key);
    if (held !== undefined) {
      throw new IndexerError(
        `Indexing already in progress for ${projectName} (${held.operation})`,
        IndexerErrorCode.INDEXING_IN_PROGRESS
      );
    }
    heldLocks.set(key, { operation, lockedAt: new Date() });

    try {
      const release = await this.acquireFileLock(projectName, key);
      try {
        return await fn();
      } finally {
        await release().catch((error: unknown) => {
          this.logger.warn({ err: error, project: projectName }, 'Failed to release index lock');
        });
      }
    } finally {
      heldLocks.delete(key);
    }
  }

  private async acquireFileLock(projectName: string, key: string): Promise<() => Promise<void>> {
    try {
      await mkdir(this.lockDir, { recursive: true });
      return await lockfile.lock(this.lockDir, {
        lockfilePath: join(this.lockDir, `${key}.lock`),
        realpath: false,
        retries: 0,
        stale: 30000,
        update: 10000,
        onCompromised: (error) => {
          this.logger.error({ err: error, project: projectName }, 'Index lock compromised');
        },
      });
    } catch (error) {
      if (isLockedError(error)) {
        throw new IndexerError(
          `Indexing already in progress for ${projectName} in another process`,
          IndexerErrorCode.INDEXING_IN_PROGRESS
        );
      }
      throw new IndexerError(
        `Failed to acquire index lock for ${projectName}: ${error instanceof Error ? error.message : String(error)}`,
        IndexerErrorCode.LOCK_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }
}
