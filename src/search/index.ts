/**
 * Search module exports
 */

export { SearchRouter, type SearchRouterDeps } from './router.js';
export {
  LiteralSearchAdapter,
  decodeRipgrepOutput,
  buildRipgrepArgs,
  type LiteralOutcome,
} from './literal.js';
export {
  toDisplayEnvelopes,
  semanticEnvelope,
  literalEnvelope,
  structuralEnvelope,
} from './display.js';
export * from './types.js';
