/**
 * Output formatting for CLI
 *
 * Human-readable (chalk) and JSON formatters for CLI commands. Results go
 * to stdout; diagnostics go to stderr.
 */

import chalk from 'chalk';
import type { DependencyImportResult } from '../deps/importer.js';
import type { IndexingResult } from '../indexer/types.js';
import type { BuildOutcome } from '../scip/builder.js';
import { toDisplayEnvelopes } from '../search/display.js';
import type { SearchResponse } from '../search/types.js';
import type { ProjectRecord } from '../storage/types.js';

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
  /** Suppress non-essential output */
  quiet?: boolean;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function formatProjectList(projects: ProjectRecord[], options: OutputOptions): void {
  if (options.json === true) {
    printJson(projects);
    return;
  }

  if (projects.length === 0) {
    console.log(chalk.yellow('No projects registered.'));
    console.log(`Register one with: ${chalk.cyan('fathom add <name> <path>')}`);
    return;
  }

  console.log(chalk.bold(`Registered projects (${projects.length}):\n`));
  for (const project of projects) {
    const indexed =
      project.lastIndexedAt !== null
        ? chalk.green(`indexed ${project.lastIndexedAt}`)
        : chalk.dim('not indexed');
    console.log(`  ${chalk.cyan(project.name)}  ${indexed}`);
    console.log(`    ${chalk.dim(project.path)}`);
  }
}

export function formatIndexResult(result: IndexingResult, options: OutputOptions): void {
  if (options.json === true) {
    printJson(result);
    return;
  }

  switch (result.status) {
    case 'indexed':
      console.log(chalk.green('\nIndexing complete:'));
      console.log(`  Files processed: ${result.filesProcessed}`);
      if (result.filesSkipped > 0) {
        console.log(chalk.yellow(`  Files skipped: ${result.filesSkipped}`));
      }
      console.log(`  Snippets indexed: ${result.snippetsIndexed}`);
      console.log(`  Orphans pruned: ${result.orphansPruned}`);
      console.log(`  Duration: ${(result.durationMs / 1000).toFixed(2)}s`);
      break;
    case 'project-not-found':
      console.error(chalk.red(`Project not found: ${result.projectName}`));
      break;
    case 'no-source-files':
      console.log(chalk.yellow(`No Java source files found under ${result.projectPath}`));
      break;
  }
}

export function formatDependencyImport(
  result: DependencyImportResult,
  options: OutputOptions
): void {
  if (options.json === true) {
    printJson(result);
    return;
  }

  if (result.jarsFound === 0) {
    console.log(chalk.yellow(`No source jars found under ${result.cacheDir}`));
    return;
  }

  console.log(chalk.bold(`Source jars found: ${result.jarsFound}\n`));
  for (const item of result.imports) {
    switch (item.kind) {
      case 'imported':
        console.log(`  ${chalk.green('imported')}  ${chalk.cyan(item.name)}`);
        break;
      case 'skipped':
        console.log(
          `  ${chalk.dim(item.registered ? 'registered' : 'present')}  ${chalk.cyan(item.name)}`
        );
        break;
      case 'failed':
        console.log(`  ${chalk.red('failed')}    ${chalk.cyan(item.name)}  ${chalk.dim(item.error)}`);
        break;
    }
  }
  console.log(`\nIndex one with: ${chalk.cyan('fathom index <name>')}`);
}

export function formatBuildOutcome(outcome: BuildOutcome, options: OutputOptions): void {
  if (options.json === true) {
    printJson(outcome);
    return;
  }

  switch (outcome.kind) {
    case 'built':
      console.log(chalk.green(`Structural index written to ${outcome.indexPath}`));
      console.log(`  Duration: ${(outcome.durationMs / 1000).toFixed(2)}s`);
      break;
    case 'project-not-found':
      console.error(chalk.red(`Project not found: ${outcome.projectName}`));
      break;
    case 'project-path-missing':
      console.error(chalk.red(`Project directory no longer exists: ${outcome.path}`));
      break;
    case 'tool-missing':
      console.error(chalk.red(`\`${outcome.command}\` not found on the PATH`));
      break;
    case 'tool-error':
      console.error(chalk.red(`Structural indexer exited with code ${outcome.exitCode}`));
      if (outcome.stderr !== '') {
        console.error(chalk.dim(outcome.stderr));
      }
      break;
    case 'timeout':
      console.error(chalk.red(`Structural indexer timed out after ${outcome.timeoutMs}ms`));
      break;
    case 'aborted':
      console.error(chalk.yellow('Structural indexing cancelled'));
      break;
  }
}

export function formatSearchResponse(response: SearchResponse, options: OutputOptions): void {
  if (options.json === true) {
    printJson({
      search_type: response.searchType,
      results: response.results,
      message: response.message,
    });
    return;
  }

  const envelopes = toDisplayEnvelopes(response);
  console.log(chalk.bold(response.message));

  envelopes.forEach((envelope, i) => {
    console.log(`\n${chalk.dim(`${i + 1}.`)} ${chalk.cyan(envelope.location)}`);
    if (envelope.title !== '') {
      console.log(`   ${chalk.bold(envelope.title)}`);
    }
    if (options.quiet !== true) {
      for (const line of envelope.preview.split('\n')) {
        console.log(`   ${chalk.dim(line)}`);
      }
    }
  });
}
