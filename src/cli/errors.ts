/**
 * CLI error types and handlers
 *
 * CLI-specific errors carry exit codes. Errors from the core are mapped to
 * an exit code and, where the user can fix the cause, an action to take.
 */

import { ConfigError } from '../config/config.js';
import { IndexerError, IndexerErrorCode } from '../indexer/types.js';
import { RegistryError, RegistryErrorCode } from '../storage/types.js';
import { SearchErrorCode, type SearchFailure } from '../search/types.js';

/**
 * Actionable error structure for humans and agents
 */
export interface AgentError {
  error: string;
  action_required: string;
  command?: string;
  hint?: string;
}

/**
 * CLI exit codes
 */
export enum ExitCode {
  /** Success */
  SUCCESS = 0,
  /** General error */
  GENERAL_ERROR = 1,
  /** Invalid arguments */
  INVALID_ARGS = 2,
  /** Project not found */
  NOT_FOUND = 3,
  /** Project has no index for the requested modality */
  NOT_INDEXED = 4,
  /** An external tool or service is unavailable */
  BACKEND_UNAVAILABLE = 5,
  /** Another run holds the project's index lock */
  LOCKED = 6,
}

/**
 * Base CLI error class
 */
export class CLIError extends Error {
  public readonly agentError: AgentError | undefined;

  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly cause?: Error,
    agentError?: AgentError
  ) {
    super(message);
    this.name = 'CLIError';
    this.agentError = agentError;
  }

  static withAgentInfo(
    agentError: AgentError,
    exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    cause?: Error
  ): CLIError {
    return new CLIError(agentError.error, exitCode, cause, agentError);
  }
}

/**
 * Error for invalid command arguments
 */
export class InvalidArgumentError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.INVALID_ARGS, cause);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Common actionable errors
 */
export const AgentErrors = {
  projectNotFound: (name: string): AgentError => ({
    error: `Project not found: ${name}`,
    action_required: 'Register the project before indexing or searching it',
    command: `fathom add ${name} <path>`,
  }),

  duplicateProject: (name: string): AgentError => ({
    error: `Project already registered: ${name}`,
    action_required: 'Choose another name, or remove the existing project first',
    command: `fathom remove ${name}`,
  }),

  indexingInProgress: (name: string): AgentError => ({
    error: `Indexing already in progress for ${name}`,
    action_required: 'Wait for the running index to finish, then retry',
  }),

  configInvalid: (details: string): AgentError => ({
    error: 'Invalid configuration',
    action_required: 'Fix the configuration file',
    hint: details,
  }),
} as const;

const SEARCH_EXIT_CODES: Record<SearchErrorCode, ExitCode> = {
  [SearchErrorCode.PROJECT_NOT_FOUND]: ExitCode.NOT_FOUND,
  [SearchErrorCode.PROJECT_PATH_MISSING]: ExitCode.NOT_FOUND,
  [SearchErrorCode.NOT_INDEXED]: ExitCode.NOT_INDEXED,
  [SearchErrorCode.BACKEND_UNAVAILABLE]: ExitCode.BACKEND_UNAVAILABLE,
  [SearchErrorCode.BACKEND_PROCESS_FAILURE]: ExitCode.GENERAL_ERROR,
  [SearchErrorCode.BACKEND_TIMEOUT]: ExitCode.GENERAL_ERROR,
  [SearchErrorCode.CANCELLED]: ExitCode.GENERAL_ERROR,
  [SearchErrorCode.INVALID_QUERY]: ExitCode.INVALID_ARGS,
  [SearchErrorCode.INTERNAL_ERROR]: ExitCode.GENERAL_ERROR,
};

/**
 * Convert a router failure into a CLI error
 */
export function searchFailureToCLIError(failure: SearchFailure): CLIError {
  const message = failure.detail !== undefined ? `${failure.message}\n${failure.detail}` : failure.message;
  return new CLIError(message, SEARCH_EXIT_CODES[failure.code]);
}

/**
 * Convert core errors into CLI errors; others pass through
 */
export function toCLIError(error: unknown): unknown {
  if (error instanceof CLIError) {
    return error;
  }
  if (error instanceof RegistryError) {
    switch (error.code) {
      case RegistryErrorCode.PROJECT_NOT_FOUND:
        return new CLIError(error.message, ExitCode.NOT_FOUND, error);
      case RegistryErrorCode.INVALID_PATH:
        return new CLIError(error.message, ExitCode.INVALID_ARGS, error);
      default:
        return new CLIError(error.message, ExitCode.GENERAL_ERROR, error);
    }
  }
  if (error instanceof IndexerError && error.code === IndexerErrorCode.INDEXING_IN_PROGRESS) {
    return new CLIError(error.message, ExitCode.LOCKED, error);
  }
  if (error instanceof ConfigError) {
    return CLIError.withAgentInfo(
      AgentErrors.configInvalid(error.message),
      ExitCode.INVALID_ARGS,
      error
    );
  }
  return error;
}

/**
 * Format an actionable error for output
 */
export function formatAgentError(error: AgentError, json = false): string {
  if (json) {
    return JSON.stringify(error, null, 2);
  }

  const lines: string[] = [`Error: ${error.error}`, '', `Action required: ${error.action_required}`];
  if (error.command) {
    lines.push('', `Run: ${error.command}`);
  }
  if (error.hint) {
    lines.push('', `Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

/**
 * Handle an error and exit the process with appropriate code
 */
export function handleError(error: unknown, json = false): never {
  const converted = toCLIError(error);
  let exitCode = ExitCode.GENERAL_ERROR;
  let message: string;
  let agentError: AgentError | undefined;

  if (converted instanceof CLIError) {
    exitCode = converted.exitCode;
    message = converted.message;
    agentError = converted.agentError;
  } else if (converted instanceof Error) {
    message = converted.message;
  } else {
    message = String(converted);
  }

  if (agentError) {
    console.error(formatAgentError(agentError, json));
  } else if (json) {
    console.error(JSON.stringify({ error: { code: exitCode, message } }));
  } else {
    console.error(`Error: ${message}`);
  }

  process.exit(exitCode);
}
