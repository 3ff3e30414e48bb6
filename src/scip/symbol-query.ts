/**
 * Dotted symbol query parser
 *
 * Turns `com.example.Main.greet` into the descriptor suffix that SCIP
 * method symbols end with: `com/example/Main#greet().`
 *
 *   package := segment ('/' segment)*
 *   suffix  := package '/' Type '#' method '().'
 *
 * With exactly two segments the package is empty and the suffix keeps its
 * leading `/` (`/Main#greet().`), so `Main` does not also match `OtherMain`.
 */

export interface SymbolQuery {
  /** `/`-joined package segments; empty for a two-segment query */
  packagePath: string;
  typeName: string;
  methodName: string;
  suffix: string;
}

export type SymbolQueryRejection = 'too-short' | 'empty-segment';

export type SymbolQueryParse =
  | { ok: true; query: SymbolQuery }
  | { ok: false; reason: SymbolQueryRejection };

export const MIN_QUERY_SEGMENTS = 2;

export function parseSymbolQuery(dotted: string): SymbolQueryParse {
  const segments = dotted.trim().split('.');
  if (segments.length < MIN_QUERY_SEGMENTS) {
    return { ok: false, reason: 'too-short' };
  }
  if (segments.some((s) => s === '')) {
    return { ok: false, reason: 'empty-segment' };
  }

  const methodName = segments[segments.length - 1] ?? '';
  const typeName = segments[segments.length - 2] ?? '';
  const packagePath = segments.slice(0, -2).join('/');

  return {
    ok: true,
    query: {
      packagePath,
      typeName,
      methodName,
      suffix: `${packagePath}/${typeName}#${methodName}().`,
    },
  };
}
