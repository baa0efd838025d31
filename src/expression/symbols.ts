/**
 * Free-symbol extraction for oracle-grammar expressions.
 *
 * @packageDocumentation
 */

/** Built-in constants of the oracle grammar that are never free variables. */
export const BUILTIN_CONSTANTS: ReadonlySet<string> = new Set([
  'Infinity',
  'Pi',
  'E',
  'I',
  'True',
  'False',
]);

const TOKEN_PATTERN = /"(?:[^"\\]|\\.)*"|\d+(?:\.\d+)?|[A-Za-z$][A-Za-z0-9$]*/g;

/**
 * Returns the free symbols of `expr` in first-seen order.
 *
 * An identifier immediately followed by `[` is a function head, not a
 * symbol. String literals and {@link BUILTIN_CONSTANTS} are skipped.
 *
 * @example
 * ```typescript
 * freeSymbols('y*Log[y] + Exp[x]'); // ['y', 'x']
 * ```
 */
export function freeSymbols(expr: string): string[] {
  const symbols: string[] = [];
  const seen = new Set<string>();

  for (const match of expr.matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    const first = token.charAt(0);
    if (first === '"' || (first >= '0' && first <= '9')) {
      continue;
    }
    if (BUILTIN_CONSTANTS.has(token)) {
      continue;
    }
    const after = expr.slice((match.index ?? 0) + token.length).trimStart();
    if (after.startsWith('[')) {
      continue;
    }
    if (!seen.has(token)) {
      seen.add(token);
      symbols.push(token);
    }
  }

  return symbols;
}

/**
 * Returns the symbols of `expr` that are not in `allowed`.
 */
export function foreignSymbols(expr: string, allowed: Iterable<string>): string[] {
  const allowedSet = new Set(allowed);
  return freeSymbols(expr).filter((symbol) => !allowedSet.has(symbol));
}
