/**
 * Java method extractor for Fathom
 *
 * Walks the tree-sitter AST and emits one snippet per method or constructor
 * declaration that has both a name and a body.
 */

import type Parser from 'tree-sitter';
import { initializeTreeSitter, parseJava } from './tree-sitter.js';
import type { Snippet } from './types.js';

/**
 * Declarations that produce a snippet
 */
const METHOD_NODE_TYPES = new Set(['method_declaration', 'constructor_declaration']);

/**
 * Declarations that name a snippet's container
 */
const CONTAINER_NODE_TYPES = new Set([
  'class_declaration',
  'interface_declaration',
  'enum_declaration',
  'record_declaration',
]);

/**
 * Name of the nearest enclosing type declaration, or null
 */
function findContainerName(node: Parser.SyntaxNode): string | null {
  let current = node.parent;
  while (current !== null) {
    if (CONTAINER_NODE_TYPES.has(current.type)) {
      return current.childForFieldName('name')?.text ?? null;
    }
    current = current.parent;
  }
  return null;
}

function toSnippet(node: Parser.SyntaxNode, filePath: string): Snippet | null {
  const nameNode = node.childForFieldName('name');
  const bodyNode = node.childForFieldName('body');
  if (nameNode === null || bodyNode === null) {
    return null;
  }

  return {
    filePath,
    className: findContainerName(node),
    methodName: nameNode.text,
    parameters: node.childForFieldName('parameters')?.text ?? null,
    returnType: node.childForFieldName('type')?.text ?? null,
    startLine: bodyNode.startPosition.row + 1,
    endLine: bodyNode.endPosition.row + 1,
    codeBody: bodyNode.text,
  };
}

/**
 * Extract snippets from an already-parsed tree, in source order
 */
export function extractSnippetsFromTree(tree: Parser.Tree, filePath: string): Snippet[] {
  const snippets: Snippet[] = [];
  const stack: Parser.SyntaxNode[] = [tree.rootNode];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;

    if (METHOD_NODE_TYPES.has(node.type)) {
      const snippet = toSnippet(node, filePath);
      if (snippet !== null) {
        snippets.push(snippet);
      }
    }

    // Push in reverse so the leftmost child is visited first
    for (let i = node.namedChildCount - 1; i >= 0; i--) {
      const child = node.namedChild(i);
      if (child !== null) {
        stack.push(child);
      }
    }
  }

  return snippets;
}

/**
 * Parse Java source and extract its method snippets
 *
 * @param filePath - Project-relative path recorded on every snippet
 * @param source - File contents
 */
export async function extractSnippets(filePath: string, source: string): Promise<Snippet[]> {
  await initializeTreeSitter();
  return extractSnippetsFromTree(parseJava(source), filePath);
}
