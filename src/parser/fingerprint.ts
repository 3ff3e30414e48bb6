/**
 * Snippet fingerprinting
 *
 * A snippet's identity is its location, not its content: editing a method
 * body keeps the fingerprint, moving the method changes it.
 */

import { createHash } from 'node:crypto';
import type { FingerprintParts } from './types.js';

/**
 * SHA-256 hex digest of `filePath|className|methodName|startLine`
 */
export function computeFingerprint(parts: FingerprintParts): string {
  const key = [parts.filePath, parts.className ?? '', parts.methodName, String(parts.startLine)].join(
    '|'
  );
  return createHash('sha256').update(key, 'utf8').digest('hex');
}

/**
 * Fingerprint of an extracted snippet
 */
export function fingerprintSnippet(snippet: FingerprintParts): string {
  return computeFingerprint(snippet);
}
