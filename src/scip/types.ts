/**
 * Structural index types for Fathom
 */

/**
 * SCIP symbol role bit flags
 */
export const SymbolRole = {
  Definition: 0x1,
  Import: 0x2,
  WriteAccess: 0x4,
  ReadAccess: 0x8,
  Generated: 0x10,
  Test: 0x20,
  ForwardDefinition: 0x40,
} as const;

export interface ScipOccurrence {
  symbol: string;
  symbolRoles: number;
  /** 0-based, 3 or 4 elements in a well-formed index */
  range: number[];
}

export interface ScipDocument {
  relativePath: string;
  occurrences: ScipOccurrence[];
}

/**
 * Decoded index, reduced to what structural search reads
 */
export interface ScipIndex {
  documents: ScipDocument[];
  /** Documents and occurrences skipped because they failed validation */
  malformedRecords: number;
}

/**
 * 0-based span decoded from an occurrence range
 */
export interface Range {
  startLine: number;
  startChar: number;
  endLine: number;
  endChar: number;
}

export class ScipIndexError extends Error {
  constructor(
    message: string,
    public readonly code: ScipIndexErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ScipIndexError';
  }
}

export enum ScipIndexErrorCode {
  /** No index file at the path */
  NOT_FOUND = 'NOT_FOUND',
  /** The file is not a decodable SCIP index */
  DECODE_FAILED = 'DECODE_FAILED',
  /** The bundled schema could not be loaded */
  SCHEMA_FAILED = 'SCHEMA_FAILED',
}
