import type { Range } from './types.js';

/**
 * Decode a SCIP occurrence range
 *
 * `[startLine, startChar, endLine, endChar]`, or `[startLine, startChar,
 * endChar]` for a span on one line. Any other length is malformed.
 */
export function decodeRange(range: readonly number[]): Range | null {
  if (range.length === 4) {
    const [startLine, startChar, endLine, endChar] = range;
    if (
      startLine === undefined ||
      startChar === undefined ||
      endLine === undefined ||
      endChar === undefined
    ) {
      return null;
    }
    return { startLine, startChar, endLine, endChar };
  }

  if (range.length === 3) {
    const [startLine, startChar, endChar] = range;
    if (startLine === undefined || startChar === undefined || endChar === undefined) {
      return null;
    }
    return { startLine, startChar, endLine: startLine, endChar };
  }

  return null;
}
