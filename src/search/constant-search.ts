/**
 * Search over candidate constants `C = 10^c`.
 *
 * Exponents are tried in ascending order. The first exponent at which
 * every piece resolves to `True` proves the claim. A certified `False`
 * disproves it according to the {@link DisproofPolicy}. Any error raised
 * by the oracle, or a series payload that does not give one verdict per
 * subrange, ends the search with an unknown outcome; it is never read as
 * `False`.
 *
 * @packageDocumentation
 */

import {
  OracleTransportError,
  parseSeriesPayload,
  toOracleTransportError,
  type OracleVerdict,
  type SeriesPayload,
} from '../oracle/index.js';
import { buildInequalityQuery, buildSeriesProgram, buildSeriesQueries } from '../query/index.js';
import type {
  DisproofPolicy,
  ExponentRange,
  InequalitySearchOptions,
  SearchOutcome,
  SearchResult,
  SeriesSearchOptions,
  VerificationAttempt,
} from './types.js';

/**
 * Lists the exponents of a range in ascending order.
 *
 * @throws RangeError if an endpoint is not an integer or `from > to`.
 */
export function exponentsOf(range: ExponentRange): number[] {
  if (!Number.isInteger(range.from) || !Number.isInteger(range.to)) {
    throw new RangeError(`Exponent range endpoints must be integers, got ${String(range.from)}..${String(range.to)}`);
  }
  if (range.from > range.to) {
    throw new RangeError(`Exponent range must be ascending, got ${String(range.from)}..${String(range.to)}`);
  }
  const exponents: number[] = [];
  for (let c = range.from; c <= range.to; c++) {
    exponents.push(c);
  }
  return exponents;
}

/**
 * Whether a `False` at `exponent` ends the search.
 */
function falseIsFinal(policy: DisproofPolicy, exponent: number, range: ExponentRange): boolean {
  return policy === 'first-false' || exponent === range.to;
}

class AttemptLog {
  readonly attempts: VerificationAttempt[] = [];

  constructor(private readonly onAttempt: ((attempt: VerificationAttempt) => void) | undefined) {}

  record(piece: number, exponent: number, verdict: OracleVerdict): void {
    const attempt: VerificationAttempt = { piece, exponent, verdict };
    this.attempts.push(attempt);
    this.onAttempt?.(attempt);
  }

  finish(outcome: SearchOutcome): SearchResult {
    return { outcome, attempts: this.attempts };
  }
}

/**
 * Searches for a constant that makes `lhs <= C * rhs` hold on every
 * subdomain. Subdomains are queried one at a time.
 *
 * @example
 * ```typescript
 * const { outcome } = await searchInequalityConstant({
 *   claim,
 *   partition: defaultPartition(claim),
 *   oracle,
 *   range: { from: 0, to: 6 },
 * });
 * ```
 */
export async function searchInequalityConstant(options: InequalitySearchOptions): Promise<SearchResult> {
  const { claim, partition, oracle, range } = options;
  const policy = options.policy ?? 'first-false';
  const log = new AttemptLog(options.onAttempt);

  for (const exponent of exponentsOf(range)) {
    let allTrue = true;

    for (const [i, subdomain] of partition.subdomains.entries()) {
      const piece = i + 1;
      const query = buildInequalityQuery(claim, subdomain, exponent);
      let verdict: OracleVerdict;
      try {
        verdict = await oracle.resolveForall(query);
      } catch (error) {
        return log.finish({ status: 'unknown', cause: 'transport', error: toOracleTransportError(error, 'resolution') });
      }
      log.record(piece, exponent, verdict);

      if (verdict === 'false') {
        if (falseIsFinal(policy, exponent, range)) {
          return log.finish({ status: 'disproved', exponent, piece });
        }
        allTrue = false;
        break;
      }
      if (verdict === 'unknown') {
        allTrue = false;
      }
    }

    if (allTrue) {
      return log.finish({ status: 'proved', exponent });
    }
  }

  return log.finish({ status: 'unknown', cause: 'inconclusive' });
}

/**
 * Searches for a constant that bounds the sum on every subrange. Each
 * exponent costs one batched `evaluate` call covering all subranges.
 */
export async function searchSeriesConstant(options: SeriesSearchOptions): Promise<SearchResult> {
  const { claim, partition, oracle, range } = options;
  const policy = options.policy ?? 'first-false';
  const log = new AttemptLog(options.onAttempt);
  const subranges = buildSeriesQueries(claim, partition);

  for (const exponent of exponentsOf(range)) {
    const program = buildSeriesProgram(claim, subranges, exponent);

    let payload: SeriesPayload;
    try {
      payload = parseSeriesPayload(await oracle.evaluate(program));
    } catch (error) {
      return log.finish({ status: 'unknown', cause: 'transport', error: toOracleTransportError(error, 'resolution') });
    }
    for (const line of payload.logs) {
      options.onOracleLog?.(line, exponent);
    }

    if (payload.verdicts !== 'all-true' && payload.verdicts.length !== subranges.length) {
      const error = new OracleTransportError(
        `Unexpected series payload: ${String(payload.verdicts.length)} verdict(s) for ${String(subranges.length)} subrange(s)`,
        { oracle: 'resolution' }
      );
      return log.finish({ status: 'unknown', cause: 'transport', error });
    }
    const verdicts = payload.verdicts === 'all-true' ? subranges.map((): OracleVerdict => 'true') : payload.verdicts;

    verdicts.forEach((verdict, i) => {
      log.record(i + 1, exponent, verdict);
    });

    if (verdicts.length > 0 && verdicts.every((verdict) => verdict === 'true')) {
      return log.finish({ status: 'proved', exponent });
    }

    const falseAt = verdicts.indexOf('false');
    if (falseAt >= 0 && falseIsFinal(policy, exponent, range)) {
      return log.finish({ status: 'disproved', exponent, piece: falseAt + 1 });
    }
  }

  return log.finish({ status: 'unknown', cause: 'inconclusive' });
}
