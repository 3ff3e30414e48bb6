/**
 * Literal search through ripgrep
 *
 * ripgrep exits 0 when something matched, 1 when nothing did, and 2 or more
 * on errors. Its `--json` output is one record per line; only `match`
 * records are kept.
 */

import { z } from 'zod';
import type { LiteralConfig } from '../config/schema.js';
import { createChildLogger, type FathomLogger } from '../logging/logger.js';
import { runProcess, type ProcessRunner } from '../process/runner.js';
import type { LiteralMatch } from './types.js';

/**
 * ripgrep encodes text as `{text}` when it is valid UTF-8, else `{bytes}` (base64)
 */
const ArbitraryDataSchema = z.union([
  z.object({ text: z.string() }),
  z.object({ bytes: z.string() }),
]);

const MatchRecordSchema = z.object({
  type: z.literal('match'),
  data: z.object({
    path: ArbitraryDataSchema,
    lines: ArbitraryDataSchema,
    line_number: z.number().int(),
    absolute_offset: z.number().int(),
    submatches: z.array(
      z.object({
        match: ArbitraryDataSchema,
        start: z.number().int(),
        end: z.number().int(),
      })
    ),
  }),
});

export type LiteralOutcome =
  | { kind: 'success'; matches: LiteralMatch[] }
  | { kind: 'no-matches' }
  | { kind: 'tool-missing'; command: string }
  | { kind: 'root-missing'; projectRoot: string }
  | { kind: 'tool-error'; exitCode: number; stderr: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'aborted' };

function decodeData(data: z.infer<typeof ArbitraryDataSchema>): string {
  return 'text' in data ? data.text : Buffer.from(data.bytes, 'base64').toString('utf8');
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/**
 * Decode ripgrep `--json` output into match records, in output order
 *
 * Lines that are not JSON, and records of any other type, are discarded.
 */
export function decodeRipgrepOutput(stdout: string): LiteralMatch[] {
  const matches: LiteralMatch[] = [];

  for (const line of stdout.split('\n')) {
    if (line.trim() === '') continue;

    const record = MatchRecordSchema.safeParse(parseJsonLine(line));
    if (!record.success) continue;

    const { data } = record.data;
    matches.push({
      filePath: decodeData(data.path),
      lineNumber: data.line_number,
      matchText: decodeData(data.lines).replace(/\r?\n$/, ''),
      absoluteOffset: data.absolute_offset,
      submatches: data.submatches.map((s) => ({
        start: s.start,
        end: s.end,
        text: decodeData(s.match),
      })),
    });
  }

  return matches;
}

/**
 * Arguments for a case-sensitive fixed-string search with one line of context
 */
export function buildRipgrepArgs(pattern: string, root: string): string[] {
  return [
    '--json',
    '--line-number',
    '--context',
    '1',
    '--case-sensitive',
    '--fixed-strings',
    '--',
    pattern,
    root,
  ];
}

export class LiteralSearchAdapter {
  private readonly logger: FathomLogger;

  constructor(
    private readonly config: LiteralConfig,
    logger: FathomLogger,
    private readonly runner: ProcessRunner = runProcess
  ) {
    this.logger = createChildLogger(logger, { component: 'literal-search' });
  }

  async search(
    projectRoot: string,
    pattern: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<LiteralOutcome> {
    const outcome = await this.runner(this.config.command, buildRipgrepArgs(pattern, projectRoot), {
      cwd: projectRoot,
      timeoutMs: this.config.timeoutMs,
      ...(options.signal !== undefined ? { signal: options.signal } : {}),
    });

    switch (outcome.kind) {
      case 'missing':
        this.logger.warn({ command: outcome.command }, 'Literal search tool not found');
        return { kind: 'tool-missing', command: outcome.command };
      case 'bad-cwd':
        this.logger.warn({ projectRoot }, 'Project directory does not exist');
        return { kind: 'root-missing', projectRoot };
      case 'timeout':
        this.logger.warn({ timeoutMs: outcome.timeoutMs, pattern }, 'Literal search timed out');
        return { kind: 'timeout', timeoutMs: outcome.timeoutMs };
      case 'aborted':
        return { kind: 'aborted' };
      case 'exited':
        break;
    }

    if (outcome.exitCode === 1) {
      return { kind: 'no-matches' };
    }
    if (outcome.exitCode !== 0) {
      this.logger.error(
        { exitCode: outcome.exitCode, stderr: outcome.stderr },
        'Literal search tool failed'
      );
      return { kind: 'tool-error', exitCode: outcome.exitCode, stderr: outcome.stderr };
    }

    const matches = decodeRipgrepOutput(outcome.stdout);
    this.logger.debug({ pattern, matches: matches.length }, 'Literal search completed');
    return { kind: 'success', matches };
  }
}
