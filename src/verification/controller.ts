/**
 * Verification controller.
 *
 * Drives one claim through proposal, validation, query building and the
 * constant search, retrying the whole cycle on recoverable failures until
 * it reaches a verdict or spends its attempt budget.
 *
 * @packageDocumentation
 */

import { describeClaim, type Claim, type InequalityClaim, type SeriesBoundClaim } from '../claims/index.js';
import { renderList } from '../expression/index.js';
import {
  OracleTransportError,
  toOracleTransportError,
  type ProposalOracle,
  type ResolutionOracle,
} from '../oracle/index.js';
import {
  MalformedPartitionError,
  defaultPartition,
  partitionElements,
  validateInequalityPartition,
  validateSeriesPartition,
  type InequalityPartition,
  type SeriesPartition,
} from '../partition/index.js';
import { buildSeriesQueries } from '../query/index.js';
import {
  searchInequalityConstant,
  searchSeriesConstant,
  type ExponentRange,
  type SearchOutcome,
  type SearchResult,
  type VerificationAttempt,
} from '../search/index.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { StateTrail } from './transitions.js';
import { Transcript, verdictLabel } from './transcript.js';
import {
  DEFAULT_VERIFICATION_SETTINGS,
  type ProofVerdict,
  type VerificationErrorKind,
  type VerificationRun,
  type VerificationSettings,
} from './types.js';

/**
 * Options for {@link VerificationController}.
 */
export interface VerificationControllerOptions {
  readonly resolutionOracle: ResolutionOracle;
  /** Without one, every attempt uses the claim's default partition. */
  readonly proposalOracle?: ProposalOracle | undefined;
  readonly settings?: Partial<VerificationSettings> | undefined;
  readonly logger?: Logger | undefined;
}

type Plan =
  | { readonly kind: 'series'; readonly claim: SeriesBoundClaim; readonly partition: SeriesPartition }
  | { readonly kind: 'inequality'; readonly claim: InequalityClaim; readonly partition: InequalityPartition };

function planFor(claim: Claim, proposal: string | undefined): Plan {
  if (claim.kind === 'series') {
    const partition = proposal === undefined ? defaultPartition(claim) : validateSeriesPartition(claim, proposal);
    return { kind: 'series', claim, partition };
  }
  const partition = proposal === undefined ? defaultPartition(claim) : validateInequalityPartition(claim, proposal);
  return { kind: 'inequality', claim, partition };
}

function rangeLabel(range: ExponentRange): string {
  return `${String(range.from)}..${String(range.to)}`;
}

function singleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function advisoryFor(claim: Claim, attempts: number, lastFailure: VerificationErrorKind): string {
  const split = claim.kind === 'series' ? 'the summation range' : 'the domain';
  return (
    `No verdict after ${String(attempts)} attempt(s); last failure: ${lastFailure}. ` +
    `Try another decomposition of ${split} or a wider constant range.`
  );
}

/** A failed attempt: its taxonomy kind and a one-line description. */
interface AttemptFailure {
  readonly kind: VerificationErrorKind;
  readonly message: string;
}

/**
 * Verifies claims against a Resolution Oracle.
 *
 * Each call to {@link verify} is independent: partitions, queries and the
 * transcript are built fresh, so one controller may serve several claims
 * and several controllers may run side by side.
 *
 * @example
 * ```typescript
 * const controller = new VerificationController({ resolutionOracle, proposalOracle });
 * const run = await controller.verify(claim);
 * console.log(run.verdict.status, formatTranscript(run.transcript));
 * ```
 */
export class VerificationController {
  private readonly resolutionOracle: ResolutionOracle;
  private readonly proposalOracle: ProposalOracle | undefined;
  private readonly settings: VerificationSettings;
  private readonly logger: Logger;

  constructor(options: VerificationControllerOptions) {
    this.resolutionOracle = options.resolutionOracle;
    this.proposalOracle = options.proposalOracle;
    this.settings = { ...DEFAULT_VERIFICATION_SETTINGS, ...options.settings };
    this.logger = options.logger ?? createSilentLogger('VerificationController');

    if (!Number.isInteger(this.settings.maxAttempts) || this.settings.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${String(this.settings.maxAttempts)}`);
    }
  }

  /**
   * Runs the proposal cycle until the claim is Proved or Disproved, or the
   * attempt budget is spent.
   *
   * Malformed proposals, inconclusive searches and anything either oracle
   * raises each consume one attempt. Errors from building partitions and
   * queries propagate.
   */
  async verify(claim: Claim): Promise<VerificationRun> {
    const { maxAttempts, policy } = this.settings;
    const ranges = this.settings.ranges[claim.kind];
    const trail = new StateTrail();
    const transcript = new Transcript();
    const attempts: (VerificationAttempt & { readonly attempt: number })[] = [];

    this.logger.info('verification_started', {
      claim: describeClaim(claim),
      kind: claim.kind,
      maxAttempts,
      policy,
    });

    let lastFailure: AttemptFailure = { kind: 'ExhaustedRetries', message: 'no attempt was made' };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        trail.enter('ProposalRequested');
      }
      const range = attempt === 1 ? ranges.initial : ranges.retry;
      transcript.add(attempt, 'attempt-started', `attempt ${String(attempt)} of ${String(maxAttempts)}, c in ${rangeLabel(range)}`);

      let plan: Plan;
      try {
        plan = planFor(claim, await this.requestProposal(claim, attempt, transcript));
      } catch (error) {
        const failure = this.classifyFailure(error);
        lastFailure = failure;
        this.recordFailure(attempt, failure, transcript);
        continue;
      }

      trail.enter('PartitionValidated');
      transcript.add(attempt, 'partition', `partition: ${renderList(partitionElements(plan.partition))}`);

      trail.enter('QueriesBuilt');
      this.recordPieces(plan, attempt, transcript);

      trail.enter('OracleEvaluating');
      const result = await this.search(plan, range, attempt, transcript, attempts);

      trail.enter('Aggregated');
      const verdict = this.conclude(result.outcome);
      if (verdict !== undefined) {
        trail.enter(verdict.status === 'proved' ? 'Proved' : 'Disproved');
        transcript.add(attempt, 'outcome', describeVerdict(verdict));
        this.logger.info('verdict_reached', { ...verdict, attempt });
        return { verdict, transcript: transcript.entries, attempts, states: trail.states };
      }

      lastFailure = this.unknownFailure(result.outcome, range);
      this.recordFailure(attempt, lastFailure, transcript);
    }

    trail.enter('Unknown');
    const verdict: ProofVerdict = {
      status: 'unknown',
      reason: 'ExhaustedRetries',
      lastFailure: lastFailure.kind,
      advisory: advisoryFor(claim, maxAttempts, lastFailure.kind),
    };
    transcript.add(maxAttempts, 'outcome', describeVerdict(verdict));
    this.logger.warn('verdict_reached', { status: verdict.status, reason: verdict.reason, lastFailure: lastFailure.kind });
    return { verdict, transcript: transcript.entries, attempts, states: trail.states };
  }

  private async requestProposal(claim: Claim, attempt: number, transcript: Transcript): Promise<string | undefined> {
    if (this.proposalOracle === undefined) {
      return undefined;
    }
    let text: string;
    try {
      text = await this.proposalOracle.proposePartition(claim);
    } catch (error) {
      throw toOracleTransportError(error, 'proposal');
    }
    transcript.add(attempt, 'proposal', `proposal: ${singleLine(text)}`);
    return text;
  }

  private recordPieces(plan: Plan, attempt: number, transcript: Transcript): void {
    if (plan.kind === 'series') {
      for (const query of buildSeriesQueries(plan.claim, plan.partition)) {
        transcript.add(attempt, 'assumption', `assumption: ${query.assumption}`, { piece: query.index });
      }
      return;
    }
    plan.partition.subdomains.forEach((subdomain, i) => {
      transcript.add(attempt, 'assumption', `domain: ${subdomain.predicate}`, { piece: i + 1 });
    });
  }

  private async search(
    plan: Plan,
    range: ExponentRange,
    attempt: number,
    transcript: Transcript,
    attempts: (VerificationAttempt & { readonly attempt: number })[]
  ): Promise<SearchResult> {
    const onAttempt = (record: VerificationAttempt): void => {
      attempts.push({ ...record, attempt });
      transcript.add(attempt, 'verdict', `verdict: ${verdictLabel(record.verdict)}`, {
        piece: record.piece,
        exponent: record.exponent,
      });
    };
    const common = { oracle: this.resolutionOracle, range, policy: this.settings.policy, onAttempt };

    if (plan.kind === 'series') {
      return searchSeriesConstant({
        ...common,
        claim: plan.claim,
        partition: plan.partition,
        onOracleLog: (line, exponent) => {
          transcript.add(attempt, 'oracle-log', `oracle: ${line}`, { exponent });
        },
      });
    }
    return searchInequalityConstant({ ...common, claim: plan.claim, partition: plan.partition });
  }

  private conclude(outcome: SearchOutcome): Exclude<ProofVerdict, { status: 'unknown' }> | undefined {
    switch (outcome.status) {
      case 'proved':
        return { status: 'proved', exponent: outcome.exponent, constant: `10^${String(outcome.exponent)}` };
      case 'disproved':
        return { status: 'disproved', exponent: outcome.exponent, piece: outcome.piece };
      case 'unknown':
        return undefined;
    }
  }

  private unknownFailure(outcome: SearchOutcome, range: ExponentRange): AttemptFailure {
    if (outcome.status === 'unknown' && outcome.cause === 'transport') {
      return { kind: 'OracleTransportError', message: outcome.error.message };
    }
    return {
      kind: 'OracleSemanticUnknown',
      message: `no constant with c in ${rangeLabel(range)} settled every piece`,
    };
  }

  private classifyFailure(error: unknown): AttemptFailure {
    if (error instanceof MalformedPartitionError) {
      return { kind: 'MalformedProposal', message: `${error.code}: ${error.message}` };
    }
    if (error instanceof OracleTransportError) {
      return { kind: 'OracleTransportError', message: error.message };
    }
    throw error;
  }

  private recordFailure(attempt: number, failure: AttemptFailure, transcript: Transcript): void {
    transcript.add(attempt, 'failure', `${failure.kind}: ${failure.message}`);
    this.logger.warn('attempt_failed', { attempt, kind: failure.kind, message: failure.message });
  }
}

/**
 * One-line description of a verdict.
 */
export function describeVerdict(verdict: ProofVerdict): string {
  switch (verdict.status) {
    case 'proved':
      return `Proved with C = ${verdict.constant}`;
    case 'disproved':
      return `Disproved: piece ${String(verdict.piece)} is False at C = 10^${String(verdict.exponent)}`;
    case 'unknown':
      return `Unknown (${verdict.reason}): ${verdict.advisory}`;
  }
}
