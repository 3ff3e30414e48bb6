/**
 * Structural index builder
 *
 * Runs the external SCIP indexer (scip-java) inside a project's root and
 * writes the index where structural search expects it.
 */

import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { StructuralConfig } from '../config/schema.js';
import { createChildLogger, type FathomLogger } from '../logging/logger.js';
import type { ProjectLock } from '../indexer/lock.js';
import { runProcess, type ProcessRunner } from '../process/runner.js';
import { structuralIndexPathFor } from '../storage/project-key.js';
import type { ProjectRegistry } from '../storage/registry.js';

export type BuildOutcome =
  | { kind: 'built'; indexPath: string; durationMs: number }
  | { kind: 'project-not-found'; projectName: string }
  | { kind: 'project-path-missing'; path: string }
  | { kind: 'tool-missing'; command: string }
  | { kind: 'tool-error'; exitCode: number; stderr: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'aborted' };

export class StructuralIndexBuilder {
  private readonly logger: FathomLogger;

  constructor(
    private readonly registry: ProjectRegistry,
    private readonly lock: ProjectLock,
    private readonly config: StructuralConfig,
    logger: FathomLogger,
    private readonly runner: ProcessRunner = runProcess
  ) {
    this.logger = createChildLogger(logger, { component: 'structural-index' });
  }

  /**
   * Where a project's index file lives
   */
  indexPathFor(projectName: string): string {
    return resolve(structuralIndexPathFor(this.config.indexDir, projectName));
  }

  /**
   * Build (or rebuild) a project's structural index
   *
   * @throws IndexerError INDEXING_IN_PROGRESS when the project is being indexed
   */
  async buildStructuralIndex(
    projectName: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<BuildOutcome> {
    return this.lock.withLock(projectName, 'structural-index', async () => {
      const project = this.registry.find(projectName);
      if (project === null) {
        return { kind: 'project-not-found', projectName };
      }

      const indexPath = this.indexPathFor(projectName);
      await mkdir(resolve(this.config.indexDir), { recursive: true });

      const log = this.logger.child({ project: projectName });
      log.info({ indexPath, command: this.config.command }, 'Building structural index');

      const startTime = Date.now();
      const outcome = await this.runner(this.config.command, ['index', '--output', indexPath], {
        cwd: project.path,
        timeoutMs: this.config.timeoutMs,
        ...(options.signal !== undefined ? { signal: options.signal } : {}),
      });

      switch (outcome.kind) {
        case 'missing':
          log.warn({ command: outcome.command }, 'Structural indexer not found');
          return { kind: 'tool-missing', command: outcome.command };
        case 'bad-cwd':
          log.warn({ path: outcome.cwd }, 'Project directory does not exist');
          return { kind: 'project-path-missing', path: outcome.cwd };
        case 'timeout':
          log.warn({ timeoutMs: outcome.timeoutMs }, 'Structural indexer timed out');
          return { kind: 'timeout', timeoutMs: outcome.timeoutMs };
        case 'aborted':
          return { kind: 'aborted' };
        case 'exited':
          if (outcome.exitCode !== 0) {
            log.error(
              { exitCode: outcome.exitCode, stderr: outcome.stderr },
              'Structural indexer failed'
            );
            return { kind: 'tool-error', exitCode: outcome.exitCode, stderr: outcome.stderr };
          }
          break;
      }

      const durationMs = Date.now() - startTime;
      log.info({ indexPath, durationMs }, 'Structural index built');
      return { kind: 'built', indexPath, durationMs };
    });
  }
}
