import { describe, it, expect } from 'vitest';
import { parseSymbolQuery } from '../../../src/scip/symbol-query.js';

describe('parseSymbolQuery', () => {
  it('should build the method descriptor suffix', () => {
    expect(parseSymbolQuery('com.example.Main.greet')).toEqual({
      ok: true,
      query: {
        packagePath: 'com/example',
        typeName: 'Main',
        methodName: 'greet',
        suffix: 'com/example/Main#greet().',
      },
    });
  });

  it('should keep the leading slash for a two-segment query', () => {
    const parsed = parseSymbolQuery('Main.greet');

    expect(parsed.ok && parsed.query.suffix).toBe('/Main#greet().');
  });

  it('should ignore surrounding whitespace', () => {
    const parsed = parseSymbolQuery('  com.example.Main.greet\n');

    expect(parsed.ok && parsed.query.suffix).toBe('com/example/Main#greet().');
  });

  it('should reject a single segment', () => {
    expect(parseSymbolQuery('greet')).toEqual({ ok: false, reason: 'too-short' });
  });

  it('should reject empty segments', () => {
    expect(parseSymbolQuery('com..Main.greet')).toEqual({ ok: false, reason: 'empty-segment' });
    expect(parseSymbolQuery('Main.')).toEqual({ ok: false, reason: 'empty-segment' });
  });
});
