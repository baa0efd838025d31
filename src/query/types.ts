/**
 * Query types sent to the Resolution Oracle.
 *
 * @packageDocumentation
 */

/**
 * A universally quantified comparison over the reals:
 * `ForAll[variables, Implies[domain, comparison]]`.
 */
export interface ForallQuery {
  readonly variables: readonly string[];
  /** Domain predicate, `True` when unconstrained. */
  readonly domain: string;
  /** `(lhs) <= 10^(c)*(rhs)` for the exponent of this query. */
  readonly comparison: string;
  readonly exponent: number;
}

/**
 * The reduction and estimate requests for one subrange of a series.
 */
export interface SubrangeQuery {
  /** 1-based position of the subrange. */
  readonly index: number;
  readonly lower: string;
  readonly upper: string;
  /** `conditions && index > lower && index < upper`. */
  readonly assumption: string;
  /** Dominant-term reduced form of the summand under `assumption`. */
  readonly reduction: string;
  /** Integral of the reduced form over the subrange. */
  readonly estimate: string;
}

/**
 * Error raised when the builder would emit malformed query text. This
 * points at a bug upstream of the builder and is not retried.
 */
export class QueryBuildError extends Error {
  /** The offending query text. */
  public readonly query: string;

  constructor(message: string, query: string) {
    super(message);
    this.name = 'QueryBuildError';
    this.query = query;
  }
}
