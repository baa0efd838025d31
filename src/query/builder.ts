/**
 * Query builder.
 *
 * Builds the text sent to the Resolution Oracle for one inequality
 * subdomain or for every subrange of a series partition. The builder only
 * guarantees balanced delimiters and ASCII text; whether a query means
 * what it should is the oracle's business.
 *
 * @packageDocumentation
 */

import type { InequalityClaim, SeriesBoundClaim } from '../claims/index.js';
import {
  hasBalancedDelimiters,
  isAscii,
  parenthesizeDisjunction,
  renderConjunction,
  renderList,
  splitConjuncts,
} from '../expression/index.js';
import type { SeriesPartition, Subdomain } from '../partition/index.js';
import { QueryBuildError, type ForallQuery, type SubrangeQuery } from './types.js';
import { SERIES_PRELUDE } from './wolfram-prelude.js';

function assertWellFormed(text: string, what: string): string {
  if (!hasBalancedDelimiters(text)) {
    throw new QueryBuildError(`Unbalanced delimiters in ${what}`, text);
  }
  if (!isAscii(text)) {
    throw new QueryBuildError(`Non-ASCII text in ${what}`, text);
  }
  return text;
}

function assertExponent(exponent: number): void {
  if (!Number.isInteger(exponent)) {
    throw new QueryBuildError(`Constant exponent must be an integer, got ${String(exponent)}`, String(exponent));
  }
}

/**
 * `10^(c)*(expr)`, the candidate bound for constant `C = 10^c`.
 */
export function scaledBound(expr: string, exponent: number): string {
  assertExponent(exponent);
  return `10^(${String(exponent)})*(${expr})`;
}

/**
 * Builds the comparison `lhs <= 10^c * rhs` over one subdomain.
 *
 * @throws QueryBuildError if the emitted text is malformed.
 *
 * @example
 * ```typescript
 * buildInequalityQuery(claim, { conjuncts: ['x > 1'], predicate: 'x > 1' }, 0);
 * // { variables: ['x'], domain: 'x > 1', comparison: '(x) <= 10^(0)*(x)', exponent: 0 }
 * ```
 */
export function buildInequalityQuery(claim: InequalityClaim, subdomain: Subdomain, exponent: number): ForallQuery {
  const comparison = `(${claim.lhs}) <= ${scaledBound(claim.rhs, exponent)}`;
  return {
    variables: claim.variables,
    domain: assertWellFormed(subdomain.predicate, 'subdomain predicate'),
    comparison: assertWellFormed(comparison, 'comparison'),
    exponent,
  };
}

/**
 * Renders a {@link ForallQuery} as `Resolve[ForAll[...], Reals]`.
 *
 * With two or more variables the quantifier is tried in every variable
 * order. Any order resolving to `True` gives `True`; otherwise the result
 * is the resolution in the claim's own order.
 */
export function renderForallProgram(query: ForallQuery): string {
  const body = `Implies[${query.domain}, ${query.comparison}]`;
  let program: string;
  if (query.variables.length === 0) {
    program = `Resolve[${body}, Reals]`;
  } else if (query.variables.length === 1) {
    program = `Resolve[ForAll[${renderList(query.variables)}, ${body}], Reals]`;
  } else {
    const vars = renderList(query.variables);
    program =
      `If[AnyTrue[Permutations[${vars}], TrueQ[Resolve[ForAll[#, ${body}], Reals]] &], True, ` +
      `Resolve[ForAll[${vars}, ${body}], Reals]]`;
  }
  return assertWellFormed(program, 'forall query');
}

/**
 * Builds one reduction and estimate request per consecutive pair of
 * breakpoints.
 *
 * @throws QueryBuildError if the partition has fewer than two breakpoints
 * or an emitted request is malformed.
 */
export function buildSeriesQueries(claim: SeriesBoundClaim, partition: SeriesPartition): SubrangeQuery[] {
  const points = partition.breakpoints;
  if (points.length < 2) {
    throw new QueryBuildError('A series partition needs at least two breakpoints', renderList(points));
  }

  const index = claim.summationIndex;
  const base = splitConjuncts(claim.conditions).map(parenthesizeDisjunction);
  const queries: SubrangeQuery[] = [];

  for (let i = 0; i + 1 < points.length; i++) {
    const lower = points[i] ?? '';
    const upper = points[i + 1] ?? '';
    const piece = i + 1;
    const assumption = renderConjunction([...base, `${index} > ${lower}`, `${index} < ${upper}`]);
    const reduction = `reducedForm[${claim.formula}, ${assumption}, ${String(piece)}]`;
    const estimate = `Integrate[${reduction}, {${index}, ${lower}, ${upper}}, Assumptions -> (${assumption})]`;

    queries.push({
      index: piece,
      lower,
      upper,
      assumption: assertWellFormed(assumption, `assumption for piece ${String(piece)}`),
      reduction: assertWellFormed(reduction, `reduction for piece ${String(piece)}`),
      estimate: assertWellFormed(estimate, `estimate for piece ${String(piece)}`),
    });
  }

  return queries;
}

/**
 * Builds the batched program that estimates every subrange and compares
 * each estimate with `10^c * bound` under the claim's conditions.
 *
 * The program evaluates to an association
 * `<|"Logs" -> {...}, "Result" -> True | {"True", "False", ...}|>`:
 * `True` when every comparison resolved to `True`, otherwise one verdict
 * string per subrange in order.
 *
 * @throws QueryBuildError if there are no subranges or the program text is
 * malformed.
 */
export function buildSeriesProgram(
  claim: SeriesBoundClaim,
  subranges: readonly SubrangeQuery[],
  exponent: number
): string {
  const last = subranges[subranges.length - 1];
  if (last === undefined) {
    throw new QueryBuildError('A series program needs at least one subrange', '');
  }
  const bound = scaledBound(claim.conjecturedUpperBound, exponent);
  const comparison = `Implies[${claim.conditions}, # <= ${bound}]`;
  const resolve =
    claim.otherVariables.length === 0
      ? `Resolve[${comparison}, Reals] &`
      : `Resolve[ForAll[${renderList(claim.otherVariables)}, ${comparison}], Reals] &`;

  const estimates = subranges.map(
    (query) =>
      `(logForm[pieceLabel[${String(query.index)}, "assumption"], ${query.assumption}]; ${query.estimate})`
  );

  const program = [
    SERIES_PRELUDE.trim(),
    'log["== verification run =="];',
    `logForm["formula", ${claim.formula}];`,
    `logForm["conditions", ${claim.conditions}];`,
    `logForm["breakpoints", ${renderList([...subranges.map((q) => q.lower), last.upper])}];`,
    `estimates = {${estimates.join(',\n  ')}};`,
    `log["constant C = " <> ToString[10^(${String(exponent)}), InputForm]];`,
    `verdicts = (${resolve}) /@ estimates;`,
    'Do[logForm[pieceLabel[i, "verdict"], verdicts[[i]]], {i, Length[verdicts]}];',
    '<|"Logs" -> logMessages, "Result" -> If[AllTrue[verdicts, TrueQ], True, ToString[#, InputForm] & /@ verdicts]|>',
  ].join('\n');

  return assertWellFormed(program, 'series program');
}
