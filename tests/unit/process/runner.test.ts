import { describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runProcess } from '../../../src/process/runner.js';

const NODE = process.execPath;

describe('runProcess', () => {
  it('should capture output and exit code', async () => {
    const outcome = await runProcess(
      NODE,
      ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
      { timeoutMs: 10000 }
    );

    expect(outcome).toEqual({ kind: 'exited', exitCode: 3, stdout: 'out', stderr: 'err' });
  });

  it('should run in the given directory', async () => {
    const outcome = await runProcess(NODE, ['-e', 'process.stdout.write(process.cwd())'], {
      cwd: '/',
      timeoutMs: 10000,
    });

    expect(outcome.kind === 'exited' ? outcome.stdout : '').toBe('/');
  });

  it('should report a missing executable', async () => {
    const outcome = await runProcess('fathom-no-such-tool', [], { timeoutMs: 1000 });

    expect(outcome).toEqual({ kind: 'missing', command: 'fathom-no-such-tool' });
  });

  it('should report a missing working directory rather than a missing executable', async () => {
    const cwd = join(tmpdir(), 'fathom-no-such-dir', 'project');

    const outcome = await runProcess(NODE, ['--version'], { cwd, timeoutMs: 5000 });

    expect(outcome).toEqual({ kind: 'bad-cwd', cwd });
  });

  it('should report a working directory that is a file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'fathom-runner-'));
    const file = join(dir, 'not-a-dir');
    writeFileSync(file, '');

    try {
      expect(await runProcess(NODE, ['--version'], { cwd: file, timeoutMs: 5000 })).toEqual({
        kind: 'bad-cwd',
        cwd: file,
      });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should kill a process that exceeds its timeout', async () => {
    const outcome = await runProcess(NODE, ['-e', 'setTimeout(() => {}, 60000)'], {
      timeoutMs: 200,
    });

    expect(outcome).toEqual({ kind: 'timeout', timeoutMs: 200 });
  });

  it('should kill a process when aborted', async () => {
    const controller = new AbortController();
    const pending = runProcess(NODE, ['-e', 'setTimeout(() => {}, 60000)'], {
      timeoutMs: 30000,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 100);

    expect(await pending).toEqual({ kind: 'aborted' });
  });

  it('should not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await runProcess(NODE, ['-e', ''], {
      timeoutMs: 1000,
      signal: controller.signal,
    });

    expect(outcome).toEqual({ kind: 'aborted' });
  });
});
