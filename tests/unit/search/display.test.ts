import { describe, it, expect } from 'vitest';
import {
  literalEnvelope,
  semanticEnvelope,
  structuralEnvelope,
  toDisplayEnvelopes,
} from '../../../src/search/display.js';
import type { SemanticMatch } from '../../../src/search/types.js';

const SEMANTIC: SemanticMatch = {
  id: 'abc',
  document: '{\n    return "Hello, " + name;\n}',
  metadata: {
    filePath: 'src/main/java/com/example/Main.java',
    className: 'Main',
    methodName: 'greet',
    parameters: '(String name)',
    returnType: 'String',
    startLine: 12,
    endLine: 14,
  },
  distance: 0.12,
};

describe('display envelopes', () => {
  it('should render a semantic match with its signature', () => {
    expect(semanticEnvelope(SEMANTIC)).toEqual({
      location: 'src/main/java/com/example/Main.java:12',
      title: 'String Main.greet(String name)',
      preview: '{\n    return "Hello, " + name;\n}',
    });
  });

  it('should leave out a missing class and return type', () => {
    const envelope = semanticEnvelope({
      ...SEMANTIC,
      metadata: { ...SEMANTIC.metadata, className: null, returnType: null },
    });

    expect(envelope.title).toBe('greet(String name)');
  });

  it('should truncate long previews', () => {
    const document = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join('\n');

    const { preview } = semanticEnvelope({ ...SEMANTIC, document });

    expect(preview.split('\n')).toHaveLength(9);
    expect(preview.endsWith('line 8\n…')).toBe(true);
  });

  it('should render a literal match', () => {
    expect(
      literalEnvelope({
        filePath: '/p/Main.java',
        lineNumber: 13,
        matchText: 'if (StringUtils.isBlank(name)) {',
        absoluteOffset: 0,
        submatches: [
          { start: 4, end: 15, text: 'StringUtils' },
          { start: 16, end: 23, text: 'isBlank' },
        ],
      })
    ).toEqual({
      location: '/p/Main.java:13',
      title: 'StringUtils, isBlank',
      preview: 'if (StringUtils.isBlank(name)) {',
    });
  });

  it('should render a structural match with line and column', () => {
    expect(
      structuralEnvelope({
        symbol: 'semanticdb maven . . com/example/Main#greet().',
        filePath: '/p/Main.java',
        startLine: 12,
        startChar: 26,
        endLine: 12,
        endChar: 31,
      })
    ).toEqual({
      location: '/p/Main.java:12:26',
      title: 'semanticdb maven . . com/example/Main#greet().',
      preview: 'lines 12-12, columns 26-31',
    });
  });

  it('should render every result of a response in order', () => {
    const envelopes = toDisplayEnvelopes({
      searchType: 'semantic',
      results: [SEMANTIC, { ...SEMANTIC, metadata: { ...SEMANTIC.metadata, startLine: 20 } }],
      message: 'Found 2 semantic matches',
    });

    expect(envelopes.map((e) => e.location)).toEqual([
      'src/main/java/com/example/Main.java:12',
      'src/main/java/com/example/Main.java:20',
    ]);
  });
});
