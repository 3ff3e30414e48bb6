/**
 * Progress display for CLI
 *
 * Displays indexing progress to stderr for clean stdout output.
 */

import type { IndexingProgressEvent } from '../indexer/types.js';

/**
 * Progress display options
 */
export interface ProgressOptions {
  /** Suppress progress output */
  quiet?: boolean;
  /** Output in JSON format (disables progress display) */
  json?: boolean;
}

/**
 * Handles progress output to stderr with in-place updates on a terminal
 */
export class ProgressDisplay {
  private readonly quiet: boolean;
  private readonly json: boolean;
  private readonly isTerminal: boolean;
  private lastLineLength = 0;

  constructor(options: ProgressOptions = {}) {
    this.quiet = options.quiet === true;
    this.json = options.json === true;
    this.isTerminal = process.stderr.isTTY === true;
  }

  private clearLine(): void {
    if (this.isTerminal) {
      process.stderr.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
    }
  }

  /**
   * Write a progress line (in-place update)
   */
  private writeLine(text: string): void {
    if (this.isTerminal) {
      this.clearLine();
      process.stderr.write(text);
      this.lastLineLength = text.length;
    } else {
      process.stderr.write(text + '\n');
    }
  }

  /**
   * Write a permanent message (moves to new line)
   */
  private writeMessage(text: string): void {
    if (this.isTerminal) {
      this.clearLine();
    }
    process.stderr.write(text + '\n');
    this.lastLineLength = 0;
  }

  handleProgress(event: IndexingProgressEvent): void {
    if (this.quiet || this.json) {
      return;
    }

    switch (event.type) {
      case 'started':
        this.writeMessage(`Indexing ${event.projectName}...`);
        break;

      case 'files_listed':
        this.writeMessage(`Found ${event.totalFiles ?? 0} source files`);
        break;

      case 'file_indexed': {
        const processed = event.filesProcessed ?? 0;
        const total = event.totalFiles ?? 0;
        const percent = total > 0 ? Math.round((processed / total) * 100) : 0;
        const file = event.currentFile ?? '';
        const shortFile = file.length > 40 ? '...' + file.slice(-37) : file;
        this.writeLine(`[${percent}%] ${processed}/${total} files - ${shortFile}`);
        break;
      }

      case 'file_skipped':
        this.writeMessage(`Skipped ${event.currentFile ?? ''}: ${event.error ?? 'unknown error'}`);
        break;

      case 'orphans_pruned':
        this.writeMessage(`Pruned ${event.orphansPruned ?? 0} stale snippets`);
        break;

      case 'completed':
        this.clearLine();
        this.lastLineLength = 0;
        break;
    }
  }

  createCallback(): (event: IndexingProgressEvent) => void {
    return (event: IndexingProgressEvent): void => {
      this.handleProgress(event);
    };
  }

  /**
   * Finalize progress display (ensure clean state)
   */
  finish(): void {
    if (this.isTerminal && this.lastLineLength > 0) {
      this.clearLine();
    }
  }
}

export function createProgressDisplay(options: ProgressOptions = {}): ProgressDisplay {
  return new ProgressDisplay(options);
}
