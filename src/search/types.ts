/**
 * Search types for Fathom
 */

import type { SnippetMetadata } from '../storage/vector-storage.js';

/**
 * Query modality
 */
export const SEARCH_TYPES = ['semantic', 'literal', 'structural'] as const;

export type SearchType = (typeof SEARCH_TYPES)[number];

export interface SemanticMatch {
  /** Snippet fingerprint */
  id: string;
  /** Method body */
  document: string;
  metadata: SnippetMetadata;
  /** Cosine distance; lower is closer */
  distance: number;
}

export interface LiteralSubmatch {
  /** Byte offset of the match start within the line */
  start: number;
  /** Byte offset one past the match end within the line */
  end: number;
  text: string;
}

export interface LiteralMatch {
  filePath: string;
  /** 1-based */
  lineNumber: number;
  /** Matched line without its line terminator */
  matchText: string;
  /** Byte offset of the line within the file */
  absoluteOffset: number;
  submatches: LiteralSubmatch[];
}

export interface StructuralMatch {
  /** Full SCIP symbol string */
  symbol: string;
  /** Absolute path of the defining file */
  filePath: string;
  /** 1-based */
  startLine: number;
  /** 1-based */
  startChar: number;
  /** 1-based */
  endLine: number;
  /** 1-based */
  endChar: number;
}

/**
 * Results of one query, tagged by modality
 */
export type SearchResponse =
  | { searchType: 'semantic'; results: SemanticMatch[]; message: string }
  | { searchType: 'literal'; results: LiteralMatch[]; message: string }
  | { searchType: 'structural'; results: StructuralMatch[]; message: string };

/**
 * Router error codes
 */
export enum SearchErrorCode {
  /** No project registered under the name */
  PROJECT_NOT_FOUND = 'PROJECT_NOT_FOUND',
  /** The registered project directory no longer exists */
  PROJECT_PATH_MISSING = 'PROJECT_PATH_MISSING',
  /** The project has no index for the requested modality */
  NOT_INDEXED = 'NOT_INDEXED',
  /** An external tool is not installed */
  BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
  /** An external tool exited with an error */
  BACKEND_PROCESS_FAILURE = 'BACKEND_PROCESS_FAILURE',
  /** An external tool exceeded its timeout */
  BACKEND_TIMEOUT = 'BACKEND_TIMEOUT',
  /** The query was cancelled by its caller */
  CANCELLED = 'CANCELLED',
  /** Malformed request */
  INVALID_QUERY = 'INVALID_QUERY',
  /** Any other failure */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface SearchFailure {
  code: SearchErrorCode;
  message: string;
  /** Diagnostic from the failing backend */
  detail?: string;
}

export type SearchOutcome =
  | { ok: true; response: SearchResponse }
  | { ok: false; error: SearchFailure };

export interface SearchRequest {
  projectName: string;
  searchType: SearchType;
  query: string;
  /** Semantic only; defaults to the configured default */
  topK?: number;
  signal?: AbortSignal;
}

/**
 * Human-oriented rendering of any match
 */
export interface DisplayEnvelope {
  /** `path:line` or `path:line:col` */
  location: string;
  title: string;
  preview: string;
}
