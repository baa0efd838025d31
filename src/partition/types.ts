/**
 * Partition types for the decomposition step.
 *
 * @packageDocumentation
 */

/**
 * Validated breakpoints of a series claim. The first breakpoint is the
 * claim's lower summation bound and the last is its upper bound.
 */
export interface SeriesPartition {
  readonly kind: 'series';
  readonly breakpoints: readonly string[];
}

/**
 * One piece of an inequality partition: the base domain conjoined with the
 * proposed restriction.
 */
export interface Subdomain {
  /** Base-domain conjuncts first, then the restriction's own conjuncts. */
  readonly conjuncts: readonly string[];
  /** `conjuncts` joined with `&&`; `True` when there are none. */
  readonly predicate: string;
}

/**
 * Validated subdomains of an inequality claim.
 */
export interface InequalityPartition {
  readonly kind: 'inequality';
  readonly baseDomain: readonly string[];
  readonly subdomains: readonly Subdomain[];
}

/**
 * Any validated partition.
 */
export type Partition = SeriesPartition | InequalityPartition;

/**
 * Why a proposal was rejected.
 *
 * - `EMPTY_PROPOSAL`: the response had no content.
 * - `NO_LIST_LITERAL`: no `[...]` or `{...}` literal was found.
 * - `UNBALANCED_DELIMITERS`: the list literal never closes or closes with
 *   the wrong delimiter.
 * - `EMPTY_ELEMENT`: the list has an empty element (`[a, , b]`, `[a,]`).
 * - `EMPTY_LIST`: an inequality proposal had no subdomains.
 * - `FOREIGN_SYMBOL`: an element uses a symbol the claim does not declare
 *   (for series, including the summation index).
 * - `NON_ASCII`: an element still has non-ASCII text after normalisation.
 */
export type MalformedProposalCode =
  | 'EMPTY_PROPOSAL'
  | 'NO_LIST_LITERAL'
  | 'UNBALANCED_DELIMITERS'
  | 'EMPTY_ELEMENT'
  | 'EMPTY_LIST'
  | 'FOREIGN_SYMBOL'
  | 'NON_ASCII';

/**
 * Error raised when a proposal cannot be turned into a partition.
 *
 * Callers treat it as a retryable failure of one proposal cycle.
 */
export class MalformedPartitionError extends Error {
  public readonly kind = 'MalformedProposal' as const;
  public readonly code: MalformedProposalCode;
  /** The rejected proposal text. */
  public readonly proposal: string;

  constructor(code: MalformedProposalCode, message: string, proposal: string) {
    super(message);
    this.name = 'MalformedPartitionError';
    this.code = code;
    this.proposal = proposal;
  }
}
