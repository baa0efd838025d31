/**
 * Text-level helpers for expressions in the resolution-oracle grammar.
 *
 * The grammar is infix `+ - * / ^`, comparison operators, function heads
 * written `Log[...]`, `Exp[...]`, `Sqrt[...]`, the literal `Infinity`, lists in
 * braces and conjunction `&&`. Nothing here evaluates an expression; these
 * helpers only normalise, compare and split text.
 *
 * @packageDocumentation
 */

const OPENERS: ReadonlyMap<string, string> = new Map([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
]);

const CLOSERS: ReadonlySet<string> = new Set([')', ']', '}']);

/** Lower-case or alternative function heads mapped to the oracle's heads. */
const HEAD_ALIASES: readonly (readonly [RegExp, string])[] = [
  [/\bexp\s*\[/g, 'Exp['],
  [/\blog\s*\[/g, 'Log['],
  [/\bln\s*\[/g, 'Log['],
  [/\bsqrt\s*\[/g, 'Sqrt['],
  [/\b([A-Z][A-Za-z0-9$]*)\s+\[/g, '$1['],
];

/** Typographic operators mapped to their ASCII spelling. */
const SYMBOL_ALIASES: readonly (readonly [string, string])[] = [
  ['≤', '<='],
  ['≥', '>='],
  ['≠', '!='],
  ['×', '*'],
  ['·', '*'],
  ['−', '-'],
  ['∞', 'Infinity'],
  ['∧', '&&'],
];

/**
 * Rewrites function heads and typographic operators into the oracle grammar
 * and collapses runs of whitespace.
 *
 * @example
 * ```typescript
 * normalizeExpression('x ≤ exp[y]'); // 'x <= Exp[y]'
 * ```
 */
export function normalizeExpression(expr: string): string {
  let result = expr;
  for (const [pattern, replacement] of HEAD_ALIASES) {
    result = result.replace(pattern, replacement);
  }
  for (const [symbol, replacement] of SYMBOL_ALIASES) {
    result = result.split(symbol).join(replacement);
  }
  return result.replace(/\s+/g, ' ').trim();
}

/**
 * Normalises an expression and spells signed infinities as `Infinity` and
 * `-Infinity` regardless of case.
 */
export function normalizeBoundExpression(expr: string): string {
  const normalized = normalizeExpression(expr);
  if (/^\+?infinity$/i.test(normalized)) {
    return 'Infinity';
  }
  if (/^-\s*infinity$/i.test(normalized)) {
    return '-Infinity';
  }
  return normalized;
}

/**
 * Whitespace-insensitive key used to compare expressions for equality.
 */
export function canonicalKey(expr: string): string {
  return expr.replace(/\s+/g, '');
}

/**
 * True if every character is printable ASCII, tab or a line break.
 */
export function isAscii(text: string): boolean {
  return /^[\t\n\r\x20-\x7e]*$/.test(text);
}

/**
 * Checks that `()`, `[]` and `{}` are balanced and properly nested.
 */
export function hasBalancedDelimiters(text: string): boolean {
  const stack: string[] = [];
  for (const ch of text) {
    const closer = OPENERS.get(ch);
    if (closer !== undefined) {
      stack.push(closer);
    } else if (CLOSERS.has(ch)) {
      if (stack.pop() !== ch) {
        return false;
      }
    }
  }
  return stack.length === 0;
}

/**
 * Returns the index of the delimiter that closes the opener at `start`, or
 * -1 when the group is unbalanced or mismatched.
 *
 * @param text - Text to scan.
 * @param start - Index of an opening `(`, `[` or `{`.
 */
export function findMatchingClose(text: string, start: number): number {
  const stack: string[] = [];
  for (let i = start; i < text.length; i++) {
    const ch = text.charAt(i);
    const closer = OPENERS.get(ch);
    if (closer !== undefined) {
      stack.push(closer);
      continue;
    }
    if (CLOSERS.has(ch)) {
      if (stack.pop() !== ch) {
        return -1;
      }
      if (stack.length === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Splits `text` at every occurrence of `separator` that is not nested inside
 * a delimiter group. Pieces are trimmed; empty pieces are kept.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const pieces: string[] = [];
  let depth = 0;
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (depth === 0 && text.startsWith(separator, i)) {
      pieces.push(current.trim());
      current = '';
      i += separator.length - 1;
      continue;
    }
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch) && depth > 0) {
      depth--;
    }
    current += ch;
  }
  pieces.push(current.trim());

  return pieces;
}

/**
 * If `text` is a single brace group `{...}`, returns its inner text.
 */
export function unwrapBraces(text: string): string | undefined {
  if (!text.startsWith('{')) {
    return undefined;
  }
  return findMatchingClose(text, 0) === text.length - 1 ? text.slice(1, -1) : undefined;
}

/**
 * Splits a predicate into its conjuncts.
 *
 * Splits at top-level `&&` and `,`, expands brace lists such as
 * `{x > 0, y > 1}` into their items and drops `True`.
 *
 * @example
 * ```typescript
 * splitConjuncts('{x>0, y>1} && x<1'); // ['x>0', 'y>1', 'x<1']
 * ```
 */
export function splitConjuncts(predicate: string): string[] {
  const conjuncts: string[] = [];

  for (const andPiece of splitTopLevel(predicate, '&&')) {
    for (const piece of splitTopLevel(andPiece, ',')) {
      if (piece === '' || piece === 'True') {
        continue;
      }
      const inner = unwrapBraces(piece);
      if (inner !== undefined) {
        conjuncts.push(...splitConjuncts(inner));
      } else {
        conjuncts.push(piece);
      }
    }
  }

  return conjuncts;
}

/**
 * Parenthesises an expression with a top-level `||` so that joining it
 * with `&&` keeps its meaning.
 */
export function parenthesizeDisjunction(expr: string): string {
  return splitTopLevel(expr, '||').length > 1 ? `(${expr})` : expr;
}

/**
 * Removes duplicates (by {@link canonicalKey}) keeping first-seen order.
 */
export function dedupePreservingOrder(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of items) {
    const key = canonicalKey(item);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(item);
    }
  }
  return result;
}

/**
 * Joins conjuncts with `&&`; an empty conjunction renders as `True`.
 */
export function renderConjunction(conjuncts: readonly string[]): string {
  return conjuncts.length === 0 ? 'True' : conjuncts.join(' && ');
}

/**
 * Renders a list literal in the oracle grammar.
 *
 * @example
 * ```typescript
 * renderList(['0', 'h', 'Infinity']); // '{0, h, Infinity}'
 * ```
 */
export function renderList(items: readonly string[]): string {
  return `{${items.join(', ')}}`;
}
