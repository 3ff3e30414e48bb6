/**
 * External process runner
 *
 * Spawns a tool asynchronously and reports how it ended as a typed outcome.
 * The child is killed with SIGKILL when its timeout elapses or its signal
 * aborts. A missing working directory is reported before spawning, since
 * spawn raises the same ENOENT for it as for a missing executable.
 */

import { spawn } from 'node:child_process';
import { stat } from 'node:fs/promises';

export interface RunOptions {
  cwd?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ProcessOutcome =
  | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { kind: 'missing'; command: string }
  | { kind: 'bad-cwd'; cwd: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'aborted' };

/**
 * Signature shared by the real runner and test stand-ins
 */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: RunOptions
) => Promise<ProcessOutcome>;

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Run a command to completion
 *
 * Rejects only for spawn failures other than a missing executable.
 */
export const runProcess: ProcessRunner = async (command, args, options) => {
  if (options.signal?.aborted === true) {
    return { kind: 'aborted' };
  }
  if (options.cwd !== undefined && !(await isDirectory(options.cwd))) {
    return { kind: 'bad-cwd', cwd: options.cwd };
  }
  if (options.signal?.aborted === true) {
    return { kind: 'aborted' };
  }
  return spawnToCompletion(command, args, options);
};

function spawnToCompletion(
  command: string,
  args: readonly string[],
  options: RunOptions
): Promise<ProcessOutcome> {
  return new Promise<ProcessOutcome>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let ending: 'timeout' | 'aborted' | null = null;
    let settled = false;

    const settle = (outcome: ProcessOutcome | Error): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      if (outcome instanceof Error) {
        reject(outcome);
      } else {
        resolve(outcome);
      }
    };

    const kill = (reason: 'timeout' | 'aborted'): void => {
      if (ending !== null) return;
      ending = reason;
      child.kill('SIGKILL');
    };

    const onAbort = (): void => kill('aborted');
    const timer = setTimeout(() => kill('timeout'), options.timeoutMs);
    options.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error) => {
      if ('code' in error && error.code === 'ENOENT') {
        settle({ kind: 'missing', command });
        return;
      }
      settle(error);
    });

    child.on('close', (code) => {
      if (ending === 'timeout') {
        settle({ kind: 'timeout', timeoutMs: options.timeoutMs });
      } else if (ending === 'aborted') {
        settle({ kind: 'aborted' });
      } else {
        settle({
          kind: 'exited',
          exitCode: code ?? -1,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      }
    });
  });
}
