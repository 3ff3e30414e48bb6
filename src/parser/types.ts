/**
 * Parser types for Fathom
 */

/**
 * A method or constructor extracted from a Java source file
 */
export interface Snippet {
  /** Project-relative path, POSIX separators */
  filePath: string;
  /** Enclosing class, interface, enum or record; null when unknown */
  className: string | null;
  methodName: string;
  /** Raw parameter list text, including parentheses */
  parameters: string | null;
  /** Raw return type text; null for constructors */
  returnType: string | null;
  /** First line of the method body (1-based) */
  startLine: number;
  /** Last line of the method body (1-based, inclusive) */
  endLine: number;
  /** Method body source text, braces included */
  codeBody: string;
}

/**
 * Identity fields of a snippet
 */
export type FingerprintParts = Pick<Snippet, 'filePath' | 'className' | 'methodName' | 'startLine'>;

/**
 * Per-file extraction result
 */
export type FileExtraction =
  | { kind: 'file'; relativePath: string; snippets: Snippet[] }
  | { kind: 'failed'; relativePath: string; error: Error };

/**
 * Source discovery options
 */
export interface DiscoveryOptions {
  /** File extensions to include, with leading dot */
  extensions: readonly string[];
  /** minimatch globs matched against project-relative paths */
  excludePatterns: readonly string[];
}

/**
 * Parser error
 */
export class ParserError extends Error {
  constructor(
    message: string,
    public readonly code: ParserErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ParserError';
  }
}

/**
 * Parser error codes
 */
export enum ParserErrorCode {
  /** Failed to read or parse file */
  PARSE_FAILED = 'PARSE_FAILED',
  /** Grammar not loaded */
  GRAMMAR_NOT_LOADED = 'GRAMMAR_NOT_LOADED',
  /** Source root could not be scanned */
  DISCOVERY_FAILED = 'DISCOVERY_FAILED',
}
