/**
 * Claim records submitted for verification.
 *
 * Every expression is text in the resolution-oracle grammar (infix
 * `+ - * / ^`, heads `Log[...] Exp[...] Sqrt[...]`, literal `Infinity`,
 * conjunction `&&`).
 *
 * @packageDocumentation
 */

/**
 * Claim that a series is bounded above by a conjectured expression up to a
 * multiplicative constant:
 * `Sum[formula, {index, lower, upper}] <= C * conjecturedUpperBound`
 * for all parameters satisfying `conditions`.
 */
export interface SeriesBoundClaim {
  readonly kind: 'series';
  /** Catalog name, when the claim came from a catalog. */
  readonly name?: string;
  /** Summand, an expression over the index and the parameters. */
  readonly formula: string;
  /** The summation index symbol. */
  readonly summationIndex: string;
  /** Free parameters of the claim (never the index). */
  readonly otherVariables: readonly string[];
  /** Lower and upper summation bounds; may be `-Infinity` / `Infinity`. */
  readonly summationBounds: readonly [string, string];
  /** Domain predicate over the parameters; `True` when unconstrained. */
  readonly conditions: string;
  /** Target expression the sum is conjectured to be dominated by. */
  readonly conjecturedUpperBound: string;
}

/**
 * Claim that `lhs <= C * rhs` for some C > 0 and all variables in the domain.
 */
export interface InequalityClaim {
  readonly kind: 'inequality';
  readonly name?: string;
  readonly variables: readonly string[];
  /** Domain constraints, read as a conjunction. Empty means `True`. */
  readonly domain: readonly string[];
  readonly lhs: string;
  readonly rhs: string;
}

/**
 * Any claim the controller can verify.
 */
export type Claim = SeriesBoundClaim | InequalityClaim;

/**
 * Discriminant values of {@link Claim}.
 */
export type ClaimKind = Claim['kind'];

/**
 * Raw series claim as produced by a front end or a catalog. List-valued
 * fields accept either arrays or brace-list strings such as `"{h, m}"`.
 */
export interface SeriesClaimInput {
  readonly name?: string | undefined;
  readonly formula: string;
  readonly summationIndex: string;
  readonly otherVariables: readonly string[] | string;
  readonly summationBounds: readonly string[];
  readonly conditions?: string | undefined;
  readonly conjecturedUpperBound: string;
}

/**
 * Raw inequality claim. `domain` accepts an array of constraints, a
 * brace list, a comma-separated string or an `&&` conjunction.
 */
export interface InequalityClaimInput {
  readonly name?: string | undefined;
  readonly variables: readonly string[] | string;
  readonly domain?: readonly string[] | string | undefined;
  readonly lhs: string;
  readonly rhs: string;
}

/**
 * Error raised when a claim record violates its invariants.
 */
export class ClaimValidationError extends Error {
  /** The offending field. */
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'ClaimValidationError';
    this.field = field;
  }
}

/**
 * Type guard for series claims.
 */
export function isSeriesClaim(claim: Claim): claim is SeriesBoundClaim {
  return claim.kind === 'series';
}

/**
 * Type guard for inequality claims.
 */
export function isInequalityClaim(claim: Claim): claim is InequalityClaim {
  return claim.kind === 'inequality';
}

/**
 * Short human-readable label used in logs and transcripts.
 */
export function describeClaim(claim: Claim): string {
  if (claim.kind === 'series') {
    const [lower, upper] = claim.summationBounds;
    return `Sum[${claim.formula}, {${claim.summationIndex}, ${lower}, ${upper}}] << ${claim.conjecturedUpperBound}`;
  }
  return `${claim.lhs} << ${claim.rhs}`;
}
