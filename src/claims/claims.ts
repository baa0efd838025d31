/**
 * Claim construction and invariant checks.
 *
 * @packageDocumentation
 */

import {
  foreignSymbols,
  hasBalancedDelimiters,
  normalizeBoundExpression,
  normalizeExpression,
  renderConjunction,
  splitConjuncts,
  splitTopLevel,
  unwrapBraces,
} from '../expression/index.js';
import {
  ClaimValidationError,
  type InequalityClaim,
  type InequalityClaimInput,
  type SeriesBoundClaim,
  type SeriesClaimInput,
} from './types.js';

const IDENTIFIER_PATTERN = /^[A-Za-z$][A-Za-z0-9$]*$/;
const NUMERIC_PATTERN = /^-?\d+(?:\.\d+)?$/;

/**
 * Parses a list of symbol names from an array or a `{a, b}` / `a, b` string.
 *
 * @param value - Raw symbol list.
 * @param field - Field name for error messages.
 * @returns Trimmed, de-duplicated names in input order.
 * @throws ClaimValidationError if an entry is not an identifier.
 */
export function parseSymbolList(value: readonly string[] | string, field: string): string[] {
  let entries: string[];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '' || trimmed === 'True') {
      return [];
    }
    entries = splitTopLevel(unwrapBraces(trimmed) ?? trimmed, ',');
  } else {
    entries = value.map((entry) => entry.trim());
  }

  const result: string[] = [];
  for (const entry of entries) {
    if (entry === '') {
      continue;
    }
    if (!IDENTIFIER_PATTERN.test(entry)) {
      throw new ClaimValidationError(`Invalid symbol '${entry}' in '${field}'`, field);
    }
    if (!result.includes(entry)) {
      result.push(entry);
    }
  }
  return result;
}

/**
 * Parses domain constraints into a flat list of normalised conjuncts.
 */
export function parseDomain(value: readonly string[] | string | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const pieces = typeof value === 'string' ? [value] : value;
  return pieces.flatMap((piece) => splitConjuncts(normalizeExpression(piece)));
}

function requireExpression(value: string, field: string): string {
  const expr = normalizeExpression(value);
  if (expr === '') {
    throw new ClaimValidationError(`Field '${field}' must not be empty`, field);
  }
  if (!hasBalancedDelimiters(expr)) {
    throw new ClaimValidationError(`Unbalanced delimiters in '${field}': ${expr}`, field);
  }
  return expr;
}

function requireSymbolsWithin(expr: string, allowed: readonly string[], field: string): void {
  const foreign = foreignSymbols(expr, allowed);
  if (foreign.length > 0) {
    throw new ClaimValidationError(
      `Field '${field}' uses undeclared symbol(s) ${foreign.join(', ')}; declared: ${allowed.join(', ') || '(none)'}`,
      field
    );
  }
}

/**
 * Checks `lower <= upper` where that can be decided from the text alone:
 * infinite endpoints and pairs of numeric literals. Symbolic bounds are
 * accepted as given.
 */
function requireOrderedBounds(lower: string, upper: string): void {
  if (lower === 'Infinity') {
    throw new ClaimValidationError('Lower summation bound cannot be Infinity', 'summationBounds');
  }
  if (upper === '-Infinity') {
    throw new ClaimValidationError('Upper summation bound cannot be -Infinity', 'summationBounds');
  }
  if (NUMERIC_PATTERN.test(lower) && NUMERIC_PATTERN.test(upper)) {
    if (Number.parseFloat(lower) > Number.parseFloat(upper)) {
      throw new ClaimValidationError(
        `Lower summation bound ${lower} exceeds upper bound ${upper}`,
        'summationBounds'
      );
    }
  }
}

/**
 * Builds a validated {@link SeriesBoundClaim}.
 *
 * @throws ClaimValidationError when a field is malformed, a symbol is not
 * declared, or the bounds are out of order.
 *
 * @example
 * ```typescript
 * const claim = createSeriesClaim({
 *   formula: '1/d^4',
 *   summationIndex: 'd',
 *   otherVariables: [],
 *   summationBounds: ['1', 'Infinity'],
 *   conjecturedUpperBound: '1',
 * });
 * ```
 */
export function createSeriesClaim(input: SeriesClaimInput): SeriesBoundClaim {
  const index = input.summationIndex.trim();
  if (!IDENTIFIER_PATTERN.test(index)) {
    throw new ClaimValidationError(`Invalid summation index '${index}'`, 'summationIndex');
  }

  const otherVariables = parseSymbolList(input.otherVariables, 'otherVariables');
  if (otherVariables.includes(index)) {
    throw new ClaimValidationError(
      `Summation index '${index}' must not also be a parameter`,
      'otherVariables'
    );
  }

  if (input.summationBounds.length !== 2) {
    throw new ClaimValidationError(
      `Expected two summation bounds, got ${String(input.summationBounds.length)}`,
      'summationBounds'
    );
  }
  const [rawLower = '', rawUpper = ''] = input.summationBounds;
  const lower = normalizeBoundExpression(requireExpression(rawLower, 'summationBounds'));
  const upper = normalizeBoundExpression(requireExpression(rawUpper, 'summationBounds'));
  requireSymbolsWithin(lower, otherVariables, 'summationBounds');
  requireSymbolsWithin(upper, otherVariables, 'summationBounds');
  requireOrderedBounds(lower, upper);

  const formula = requireExpression(input.formula, 'formula');
  requireSymbolsWithin(formula, [index, ...otherVariables], 'formula');

  const bound = requireExpression(input.conjecturedUpperBound, 'conjecturedUpperBound');
  requireSymbolsWithin(bound, [index, ...otherVariables], 'conjecturedUpperBound');

  const conditions = renderConjunction(parseDomain(input.conditions));
  if (!hasBalancedDelimiters(conditions)) {
    throw new ClaimValidationError(`Unbalanced delimiters in 'conditions'`, 'conditions');
  }
  requireSymbolsWithin(conditions, otherVariables, 'conditions');

  const claim: SeriesBoundClaim = {
    kind: 'series',
    formula,
    summationIndex: index,
    otherVariables,
    summationBounds: [lower, upper],
    conditions,
    conjecturedUpperBound: bound,
  };
  return input.name !== undefined ? { ...claim, name: input.name } : claim;
}

/**
 * Builds a validated {@link InequalityClaim}.
 *
 * @throws ClaimValidationError when a field is malformed or uses a symbol
 * outside `variables`.
 */
export function createInequalityClaim(input: InequalityClaimInput): InequalityClaim {
  const variables = parseSymbolList(input.variables, 'variables');
  if (variables.length === 0) {
    throw new ClaimValidationError('An inequality claim needs at least one variable', 'variables');
  }

  const lhs = requireExpression(input.lhs, 'lhs');
  requireSymbolsWithin(lhs, variables, 'lhs');
  const rhs = requireExpression(input.rhs, 'rhs');
  requireSymbolsWithin(rhs, variables, 'rhs');

  const domain = parseDomain(input.domain);
  for (const constraint of domain) {
    if (!hasBalancedDelimiters(constraint)) {
      throw new ClaimValidationError(`Unbalanced delimiters in domain constraint '${constraint}'`, 'domain');
    }
    requireSymbolsWithin(constraint, variables, 'domain');
  }

  const claim: InequalityClaim = { kind: 'inequality', variables, domain, lhs, rhs };
  return input.name !== undefined ? { ...claim, name: input.name } : claim;
}
