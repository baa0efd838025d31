/**
 * Constant-exponent search types.
 *
 * @packageDocumentation
 */

import type { InequalityClaim, SeriesBoundClaim } from '../claims/index.js';
import type { OracleTransportError, OracleVerdict, ResolutionOracle } from '../oracle/index.js';
import type { InequalityPartition, SeriesPartition } from '../partition/index.js';

/**
 * Inclusive, ascending range of integer exponents `c`; the candidate
 * constant is `C = 10^c`.
 */
export interface ExponentRange {
  readonly from: number;
  readonly to: number;
}

/**
 * What a certified `False` means for the search.
 *
 * - `first-false`: the claim is disproved as soon as any piece is `False`
 *   at the current exponent.
 * - `largest-constant`: a `False` only moves the search to the next
 *   exponent; the claim is disproved only if some piece is still `False`
 *   at the largest exponent of the range.
 */
export type DisproofPolicy = 'first-false' | 'largest-constant';

/** Every supported policy, in documentation order. */
export const DISPROOF_POLICIES: readonly DisproofPolicy[] = ['first-false', 'largest-constant'];

/**
 * One oracle verdict for one piece at one exponent.
 */
export interface VerificationAttempt {
  /** 1-based piece (subrange or subdomain) number. */
  readonly piece: number;
  readonly exponent: number;
  readonly verdict: OracleVerdict;
}

/**
 * How a search ended.
 */
export type SearchOutcome =
  | { readonly status: 'proved'; readonly exponent: number }
  | { readonly status: 'disproved'; readonly exponent: number; readonly piece: number }
  | { readonly status: 'unknown'; readonly cause: 'inconclusive' }
  | { readonly status: 'unknown'; readonly cause: 'transport'; readonly error: OracleTransportError };

/**
 * Outcome plus every attempt made, in order.
 */
export interface SearchResult {
  readonly outcome: SearchOutcome;
  readonly attempts: readonly VerificationAttempt[];
}

interface SearchOptionsBase {
  readonly oracle: ResolutionOracle;
  readonly range: ExponentRange;
  /** Defaults to `first-false`. */
  readonly policy?: DisproofPolicy;
  /** Called for each attempt as soon as its verdict is known. */
  readonly onAttempt?: (attempt: VerificationAttempt) => void;
}

export interface InequalitySearchOptions extends SearchOptionsBase {
  readonly claim: InequalityClaim;
  readonly partition: InequalityPartition;
}

export interface SeriesSearchOptions extends SearchOptionsBase {
  readonly claim: SeriesBoundClaim;
  readonly partition: SeriesPartition;
  /** Called with each log line the batched program returns. */
  readonly onOracleLog?: (line: string, exponent: number) => void;
}
