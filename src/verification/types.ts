/**
 * Verification controller types.
 *
 * @packageDocumentation
 */

import type { ClaimKind } from '../claims/index.js';
import type { DisproofPolicy, ExponentRange, VerificationAttempt } from '../search/index.js';

/**
 * States of one verification run.
 *
 * A run starts in `ProposalRequested` and ends in one of the three
 * terminal states. Failed attempts return to `ProposalRequested`.
 */
export type ControllerState =
  | 'ProposalRequested'
  | 'PartitionValidated'
  | 'QueriesBuilt'
  | 'OracleEvaluating'
  | 'Aggregated'
  | 'Proved'
  | 'Disproved'
  | 'Unknown';

/**
 * Why an attempt did not reach Proved or Disproved, or why a run ended
 * Unknown.
 */
export type VerificationErrorKind =
  | 'MalformedProposal'
  | 'OracleTransportError'
  | 'OracleSemanticUnknown'
  | 'ExhaustedRetries';

/**
 * Terminal result of a run.
 */
export type ProofVerdict =
  | {
      readonly status: 'proved';
      readonly exponent: number;
      /** Witness constant, rendered as `10^c`. */
      readonly constant: string;
    }
  | {
      readonly status: 'disproved';
      readonly exponent: number;
      /** 1-based piece the oracle certified as False. */
      readonly piece: number;
    }
  | {
      readonly status: 'unknown';
      readonly reason: 'ExhaustedRetries';
      /** Failure of the last attempt. */
      readonly lastFailure: VerificationErrorKind;
      readonly advisory: string;
    };

/**
 * Kind of a transcript entry.
 */
export type TranscriptEvent =
  | 'attempt-started'
  | 'proposal'
  | 'partition'
  | 'assumption'
  | 'verdict'
  | 'oracle-log'
  | 'failure'
  | 'outcome';

/**
 * One line of a run's transcript.
 */
export interface TranscriptEntry {
  /** 1-based attempt number. */
  readonly attempt: number;
  readonly piece?: number;
  readonly exponent?: number;
  readonly event: TranscriptEvent;
  readonly message: string;
}

/**
 * Everything a run produced.
 */
export interface VerificationRun {
  readonly verdict: ProofVerdict;
  readonly transcript: readonly TranscriptEntry[];
  /** Every oracle verdict, tagged with its attempt number. */
  readonly attempts: readonly (VerificationAttempt & { readonly attempt: number })[];
  /** Controller states in the order they were entered. */
  readonly states: readonly ControllerState[];
}

/**
 * Exponent ranges for the first attempt and for every retry.
 */
export interface AttemptRanges {
  readonly initial: ExponentRange;
  readonly retry: ExponentRange;
}

/**
 * Controller settings.
 */
export interface VerificationSettings {
  /** Proposal cycles per run, at least 1. */
  readonly maxAttempts: number;
  readonly policy: DisproofPolicy;
  readonly ranges: Readonly<Record<ClaimKind, AttemptRanges>>;
}

/**
 * Defaults: five attempts, `first-false`, a single exponent `c = 0` on the
 * first attempt and a widened range on retries.
 */
export const DEFAULT_VERIFICATION_SETTINGS: VerificationSettings = {
  maxAttempts: 5,
  policy: 'first-false',
  ranges: {
    series: { initial: { from: 0, to: 0 }, retry: { from: 0, to: 4 } },
    inequality: { initial: { from: 0, to: 0 }, retry: { from: -2, to: 6 } },
  },
};

/**
 * Error thrown when the controller is asked to enter a state that is not
 * reachable from its current one.
 */
export class ControllerTransitionError extends Error {
  public readonly from: ControllerState;
  public readonly to: ControllerState;

  constructor(from: ControllerState, to: ControllerState) {
    super(`Invalid controller transition ${from} -> ${to}`);
    this.name = 'ControllerTransitionError';
    this.from = from;
    this.to = to;
  }
}
