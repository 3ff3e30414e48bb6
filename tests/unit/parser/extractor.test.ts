import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { extractSnippets } from '../../../src/parser/extractor.js';

const MAIN_PATH = 'src/main/java/com/example/Main.java';
const MAIN_SOURCE = readFileSync(
  fileURLToPath(new URL(`../../fixtures/sample-java/${MAIN_PATH}`, import.meta.url)),
  'utf8'
);

describe('extractSnippets', () => {
  it('should extract every method in source order', async () => {
    const snippets = await extractSnippets(MAIN_PATH, MAIN_SOURCE);

    expect(snippets.map((s) => s.methodName)).toEqual(['main', 'greet', 'helperMethod']);
  });

  it('should record signature parts and body lines', async () => {
    const snippets = await extractSnippets(MAIN_PATH, MAIN_SOURCE);
    const greet = snippets.find((s) => s.methodName === 'greet');

    expect(greet).toEqual({
      filePath: MAIN_PATH,
      className: 'Main',
      methodName: 'greet',
      parameters: '(String name)',
      returnType: 'String',
      startLine: 12,
      endLine: 17,
      codeBody: [
        '{',
        '        if (StringUtils.isBlank(name)) {',
        '            return "Hello, stranger";',
        '        }',
        '        return "Hello, " + name;',
        '    }',
      ].join('\n'),
    });
  });

  it('should keep the body of a private void method', async () => {
    const snippets = await extractSnippets(MAIN_PATH, MAIN_SOURCE);
    const helper = snippets.find((s) => s.methodName === 'helperMethod');

    expect(helper?.returnType).toBe('void');
    expect(helper?.parameters).toBe('()');
    expect(helper?.startLine).toBe(19);
    expect(helper?.endLine).toBe(21);
    expect(helper?.codeBody).toBe('{\n        System.out.println("helper");\n    }');
  });

  it('should include constructors without a return type', async () => {
    const source = [
      'class Point {',
      '  private final int x;',
      '  Point(int x) {',
      '    this.x = x;',
      '  }',
      '}',
    ].join('\n');

    const snippets = await extractSnippets('Point.java', source);

    expect(snippets).toHaveLength(1);
    expect(snippets[0]?.methodName).toBe('Point');
    expect(snippets[0]?.returnType).toBeNull();
    expect(snippets[0]?.startLine).toBe(3);
  });

  it('should skip methods without a body', async () => {
    const source = [
      'interface Shape {',
      '  double area();',
      '  default String label() {',
      '    return "shape";',
      '  }',
      '}',
    ].join('\n');

    const snippets = await extractSnippets('Shape.java', source);

    expect(snippets.map((s) => s.methodName)).toEqual(['label']);
    expect(snippets[0]?.className).toBe('Shape');
  });

  it('should name the innermost enclosing type', async () => {
    const source = [
      'class Outer {',
      '  static class Inner {',
      '    void run() {',
      '    }',
      '  }',
      '}',
    ].join('\n');

    const snippets = await extractSnippets('Outer.java', source);

    expect(snippets[0]?.className).toBe('Inner');
  });

  it('should return nothing for a file without methods', async () => {
    const snippets = await extractSnippets('Empty.java', 'package a;\n\nclass Empty {}\n');

    expect(snippets).toEqual([]);
  });
});
