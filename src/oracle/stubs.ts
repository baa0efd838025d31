/**
 * In-process oracles for tests and dry runs.
 *
 * Both stubs record every call. A responder may throw to simulate a
 * transport failure.
 *
 * @packageDocumentation
 */

import type { Claim } from '../claims/index.js';
import type { ForallQuery } from '../query/index.js';
import { OracleTransportError, type OracleVerdict, type ProposalOracle, type ResolutionOracle } from './types.js';

/** Answers a resolution query; `call` counts from 0. */
export type ForallResponder = (query: ForallQuery, call: number) => OracleVerdict | Promise<OracleVerdict>;

/** Answers a batched program; `call` counts from 0. */
export type EvaluateResponder = (program: string, call: number) => unknown;

/** Answers a proposal request; `call` counts from 0. */
export type ProposalResponder = (claim: Claim, call: number) => string | Promise<string>;

export interface StubResolutionOracleOptions {
  /** A fixed verdict or a responder (default: always `unknown`). */
  readonly forall?: OracleVerdict | ForallResponder;
  /** Responder for `evaluate`; without one every call fails. */
  readonly evaluate?: EvaluateResponder;
}

/**
 * Resolution Oracle that answers from a table or a function.
 *
 * @example
 * ```typescript
 * const oracle = new StubResolutionOracle({ forall: 'true', evaluate: () => ALL_TRUE_SERIES_PAYLOAD });
 * ```
 */
export class StubResolutionOracle implements ResolutionOracle {
  readonly forallCalls: ForallQuery[] = [];
  readonly evaluateCalls: string[] = [];
  private readonly forall: ForallResponder;
  private readonly evaluateResponder: EvaluateResponder | undefined;

  constructor(options: StubResolutionOracleOptions = {}) {
    const forall = options.forall ?? 'unknown';
    this.forall = typeof forall === 'function' ? forall : (): OracleVerdict => forall;
    this.evaluateResponder = options.evaluate;
  }

  async resolveForall(query: ForallQuery): Promise<OracleVerdict> {
    const call = this.forallCalls.length;
    this.forallCalls.push(query);
    return this.forall(query, call);
  }

  async evaluate(program: string): Promise<unknown> {
    const call = this.evaluateCalls.length;
    this.evaluateCalls.push(program);
    if (this.evaluateResponder === undefined) {
      throw new OracleTransportError('Stub resolution oracle has no evaluate responder', { oracle: 'resolution' });
    }
    return this.evaluateResponder(program, call);
  }
}

/**
 * Payload of a series program in which every subrange held.
 */
export const ALL_TRUE_SERIES_PAYLOAD = { Logs: [], Result: true } as const;

/**
 * Proposal Oracle that replays canned responses. With a list, call `i`
 * gets entry `i`, and calls past the end repeat the last entry.
 */
export class StubProposalOracle implements ProposalOracle {
  readonly calls: Claim[] = [];
  private readonly respond: ProposalResponder;

  constructor(responses: readonly string[] | ProposalResponder) {
    if (typeof responses === 'function') {
      this.respond = responses;
    } else {
      const replies = responses;
      this.respond = (_claim, call): string => replies[Math.min(call, replies.length - 1)] ?? '';
    }
  }

  async proposePartition(claim: Claim): Promise<string> {
    const call = this.calls.length;
    this.calls.push(claim);
    return this.respond(claim, call);
  }
}
