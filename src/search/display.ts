/**
 * Display envelopes for search results
 */

import type {
  DisplayEnvelope,
  LiteralMatch,
  SearchResponse,
  SemanticMatch,
  StructuralMatch,
} from './types.js';

const PREVIEW_LINES = 8;

function firstLines(text: string, count: number): string {
  const lines = text.split('\n');
  const head = lines.slice(0, count).join('\n');
  return lines.length > count ? `${head}\n…` : head;
}

export function semanticEnvelope(match: SemanticMatch): DisplayEnvelope {
  const { metadata } = match;
  const owner = metadata.className !== null ? `${metadata.className}.` : '';
  const signature = `${owner}${metadata.methodName}${metadata.parameters ?? '()'}`;
  return {
    location: `${metadata.filePath}:${metadata.startLine}`,
    title: metadata.returnType !== null ? `${metadata.returnType} ${signature}` : signature,
    preview: firstLines(match.document, PREVIEW_LINES),
  };
}

export function literalEnvelope(match: LiteralMatch): DisplayEnvelope {
  return {
    location: `${match.filePath}:${match.lineNumber}`,
    title: match.submatches.map((s) => s.text).join(', '),
    preview: match.matchText,
  };
}

export function structuralEnvelope(match: StructuralMatch): DisplayEnvelope {
  return {
    location: `${match.filePath}:${match.startLine}:${match.startChar}`,
    title: match.symbol,
    preview: `lines ${match.startLine}-${match.endLine}, columns ${match.startChar}-${match.endChar}`,
  };
}

/**
 * Envelopes for every result of a response, in result order
 */
export function toDisplayEnvelopes(response: SearchResponse): DisplayEnvelope[] {
  switch (response.searchType) {
    case 'semantic':
      return response.results.map(semanticEnvelope);
    case 'literal':
      return response.results.map(literalEnvelope);
    case 'structural':
      return response.results.map(structuralEnvelope);
  }
}
