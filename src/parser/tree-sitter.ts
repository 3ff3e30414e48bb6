/**
 * tree-sitter integration for Fathom
 *
 * Loads the Java grammar once and hands out parsed trees.
 */

import Parser from 'tree-sitter';
import { ParserError, ParserErrorCode } from './types.js';

const JAVA_GRAMMAR_PACKAGE = 'tree-sitter-java';

/**
 * Tree-sitter parser wrapper for Java
 */
class JavaTreeSitterParser {
  private readonly parser: Parser;
  private grammar: unknown = null;

  constructor() {
    this.parser = new Parser();
  }

  /**
   * Load the Java grammar
   */
  async initialize(): Promise<void> {
    if (this.grammar !== null) return;

    try {
      const module: unknown = await import(JAVA_GRAMMAR_PACKAGE);
      const grammar = isModuleWithDefault(module) ? module.default : module;
      if (grammar === null || grammar === undefined) {
        throw new Error(`${JAVA_GRAMMAR_PACKAGE} exported no grammar`);
      }

      this.parser.setLanguage(grammar);
      this.grammar = grammar;
    } catch (error) {
      throw new ParserError(
        'Failed to initialize tree-sitter Java grammar',
        ParserErrorCode.GRAMMAR_NOT_LOADED,
        error instanceof Error ? error : undefined
      );
    }
  }

  isReady(): boolean {
    return this.grammar !== null;
  }

  /**
   * Parse Java source code
   */
  parse(code: string): Parser.Tree {
    if (this.grammar === null) {
      throw new ParserError(
        'Grammar not loaded for language: java',
        ParserErrorCode.GRAMMAR_NOT_LOADED
      );
    }
    return this.parser.parse(code);
  }
}

function isModuleWithDefault(value: unknown): value is { default: unknown } {
  return typeof value === 'object' && value !== null && 'default' in value;
}

// Singleton instance
let parserInstance: JavaTreeSitterParser | null = null;

/**
 * Get the tree-sitter parser singleton
 */
export function getJavaParser(): JavaTreeSitterParser {
  parserInstance ??= new JavaTreeSitterParser();
  return parserInstance;
}

/**
 * Initialize the tree-sitter parser
 */
export async function initializeTreeSitter(): Promise<void> {
  await getJavaParser().initialize();
}

/**
 * Parse Java source code using tree-sitter
 */
export function parseJava(code: string): Parser.Tree {
  return getJavaParser().parse(code);
}
