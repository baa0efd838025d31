/**
 * Oracle interfaces.
 *
 * The Proposal Oracle suggests how to split a claim; the Resolution Oracle
 * decides quantified comparisons over the reals and evaluates batched
 * programs. Both are external systems reached through a transport that can
 * fail, so every call is asynchronous and may reject with
 * {@link OracleTransportError}.
 *
 * @packageDocumentation
 */

import type { Claim } from '../claims/index.js';
import type { ForallQuery } from '../query/index.js';

/**
 * Answer to a resolution query. `unknown` covers every answer that is
 * neither `True` nor `False`, such as a residual condition.
 */
export type OracleVerdict = 'true' | 'false' | 'unknown';

/**
 * Suggests a decomposition for a claim.
 */
export interface ProposalOracle {
  /**
   * Returns raw response text, expected to contain one bracketed list of
   * breakpoints (series) or subdomain predicates (inequality).
   */
  proposePartition(claim: Claim): Promise<string>;
}

/**
 * Symbolic engine that decides comparisons and evaluates programs.
 */
export interface ResolutionOracle {
  /** Decides `ForAll[variables, Implies[domain, comparison]]`. */
  resolveForall(query: ForallQuery): Promise<OracleVerdict>;
  /** Evaluates a program and returns its JSON-decoded value. */
  evaluate(program: string): Promise<unknown>;
}

/**
 * How the Resolution Oracle is reached: a local executable or a remote
 * evaluation endpoint.
 */
export type OracleTransport =
  | { readonly kind: 'local'; readonly executable: string }
  | { readonly kind: 'remote'; readonly endpoint: string };

/** Default wall-clock limit for one oracle call. */
export const DEFAULT_ORACLE_TIMEOUT_MS = 120000;

/**
 * Failure to reach an oracle or to read its answer: launch failure,
 * non-zero exit, HTTP error, timeout or an undecodable payload.
 *
 * Callers map this to an unknown outcome, never to `false`.
 */
export class OracleTransportError extends Error {
  readonly code = 'ORACLE_TRANSPORT_ERROR';
  /** Which oracle failed. */
  public readonly oracle: 'resolution' | 'proposal';
  /** True when the call hit its time limit. */
  public readonly timedOut: boolean;

  constructor(
    message: string,
    options: { oracle: 'resolution' | 'proposal'; timedOut?: boolean; cause?: unknown }
  ) {
    super(message);
    this.name = 'OracleTransportError';
    this.oracle = options.oracle;
    this.timedOut = options.timedOut ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Wraps whatever an oracle call raised as an {@link OracleTransportError},
 * keeping the original as `cause`.
 */
export function toOracleTransportError(error: unknown, oracle: 'resolution' | 'proposal'): OracleTransportError {
  if (error instanceof OracleTransportError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  const label = oracle === 'resolution' ? 'Resolution' : 'Proposal';
  return new OracleTransportError(`${label} oracle failed: ${detail}`, { oracle, cause: error });
}

/**
 * The oracle cannot be used at all, for example because the local
 * executable does not launch. Raised at construction time and not retried.
 */
export class OracleUnavailableError extends Error {
  readonly code = 'ORACLE_UNAVAILABLE';

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'OracleUnavailableError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
