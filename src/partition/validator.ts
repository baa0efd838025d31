/**
 * Partition validation.
 *
 * Turns a Proposal Oracle response (or an already tokenised list) into a
 * partition the query builder can use, or rejects it with a
 * {@link MalformedPartitionError}.
 *
 * @packageDocumentation
 */

import type { Claim, InequalityClaim, SeriesBoundClaim } from '../claims/index.js';
import {
  canonicalKey,
  dedupePreservingOrder,
  foreignSymbols,
  hasBalancedDelimiters,
  isAscii,
  normalizeBoundExpression,
  normalizeExpression,
  renderConjunction,
  parenthesizeDisjunction,
  splitConjuncts,
} from '../expression/index.js';
import { parseProposalList } from './tokenizer.js';
import {
  MalformedPartitionError,
  type InequalityPartition,
  type Partition,
  type SeriesPartition,
  type Subdomain,
} from './types.js';

/** Raw proposal text, or a list that has already been split into elements. */
export type Proposal = string | readonly string[];

function proposalText(proposal: Proposal): string {
  return typeof proposal === 'string' ? proposal : `[${proposal.join(', ')}]`;
}

function elementsOf(proposal: Proposal): string[] {
  return typeof proposal === 'string' ? parseProposalList(proposal) : [...proposal];
}

/**
 * Normalises one element and checks the rules every element must follow.
 */
function checkElement(
  element: string,
  normalize: (expr: string) => string,
  allowed: readonly string[],
  proposal: Proposal,
  position: number
): string {
  const normalized = normalize(element);
  const text = proposalText(proposal);
  const where = `element ${String(position)}`;

  if (normalized === '') {
    throw new MalformedPartitionError('EMPTY_ELEMENT', `Empty ${where}`, text);
  }
  if (!isAscii(normalized)) {
    throw new MalformedPartitionError('NON_ASCII', `Non-ASCII text in ${where}: ${normalized}`, text);
  }
  if (!hasBalancedDelimiters(normalized)) {
    throw new MalformedPartitionError('UNBALANCED_DELIMITERS', `Unbalanced delimiters in ${where}: ${normalized}`, text);
  }
  const foreign = foreignSymbols(normalized, allowed);
  if (foreign.length > 0) {
    throw new MalformedPartitionError(
      'FOREIGN_SYMBOL',
      `${where} uses ${foreign.join(', ')}; only ${allowed.join(', ') || '(no symbols)'} may appear`,
      text
    );
  }
  return normalized;
}

/**
 * Validates the breakpoints of a series partition.
 *
 * The claim's lower bound is inserted in front and its upper bound at the
 * end when the proposal omits them. An empty list yields `[lower, upper]`.
 * Breakpoints may use the claim's parameters but never the summation index.
 * Ordering between breakpoints is not checked.
 *
 * @throws MalformedPartitionError if the proposal cannot be tokenised or an
 * element breaks the rules above.
 */
export function validateSeriesPartition(claim: SeriesBoundClaim, proposal: Proposal): SeriesPartition {
  const [lower, upper] = claim.summationBounds;
  const breakpoints = elementsOf(proposal).map((element, i) =>
    checkElement(element, normalizeBoundExpression, claim.otherVariables, proposal, i + 1)
  );

  const first = breakpoints[0];
  if (first === undefined || canonicalKey(first) !== canonicalKey(lower)) {
    breakpoints.unshift(lower);
  }
  const last = breakpoints[breakpoints.length - 1];
  if (breakpoints.length < 2 || last === undefined || canonicalKey(last) !== canonicalKey(upper)) {
    breakpoints.push(upper);
  }

  return { kind: 'series', breakpoints };
}

function makeSubdomain(conjuncts: readonly string[]): Subdomain {
  return { conjuncts, predicate: renderConjunction(conjuncts) };
}

/**
 * Validates the subdomains of an inequality partition.
 *
 * For every element, conjuncts that repeat the base domain are removed,
 * the rest are de-duplicated in first-seen order, and the base domain is
 * conjoined in front. Whether the subdomains cover the base domain is not
 * checked.
 *
 * @throws MalformedPartitionError if the proposal cannot be tokenised, is
 * empty, or an element breaks the element rules.
 */
export function validateInequalityPartition(claim: InequalityClaim, proposal: Proposal): InequalityPartition {
  const elements = elementsOf(proposal);
  if (elements.length === 0) {
    throw new MalformedPartitionError('EMPTY_LIST', 'Proposal lists no subdomains', proposalText(proposal));
  }

  const baseDomain = dedupePreservingOrder(claim.domain);
  const baseKeys = new Set(baseDomain.map(canonicalKey));

  const subdomains = elements.map((element, i) => {
    const normalized = checkElement(element, normalizeExpression, claim.variables, proposal, i + 1);
    const restriction = dedupePreservingOrder(
      splitConjuncts(normalized)
        .map(parenthesizeDisjunction)
        .filter((conjunct) => !baseKeys.has(canonicalKey(conjunct)))
    );
    return makeSubdomain([...baseDomain, ...restriction]);
  });

  return { kind: 'inequality', baseDomain, subdomains };
}

/**
 * Validates a proposal for either claim kind.
 */
export function validatePartition(claim: SeriesBoundClaim, proposal: Proposal): SeriesPartition;
export function validatePartition(claim: InequalityClaim, proposal: Proposal): InequalityPartition;
export function validatePartition(claim: Claim, proposal: Proposal): Partition;
export function validatePartition(claim: Claim, proposal: Proposal): Partition {
  return claim.kind === 'series'
    ? validateSeriesPartition(claim, proposal)
    : validateInequalityPartition(claim, proposal);
}

/**
 * The partition used when no Proposal Oracle is configured: the whole
 * summation range, or the base domain as a single subdomain.
 */
export function defaultPartition(claim: SeriesBoundClaim): SeriesPartition;
export function defaultPartition(claim: InequalityClaim): InequalityPartition;
export function defaultPartition(claim: Claim): Partition;
export function defaultPartition(claim: Claim): Partition {
  if (claim.kind === 'series') {
    const [lower, upper] = claim.summationBounds;
    return { kind: 'series', breakpoints: [lower, upper] };
  }
  const baseDomain = dedupePreservingOrder(claim.domain);
  return { kind: 'inequality', baseDomain, subdomains: [makeSubdomain(baseDomain)] };
}

/**
 * Flattens a validated partition back into proposal elements.
 */
export function partitionElements(partition: Partition): string[] {
  return partition.kind === 'series'
    ? [...partition.breakpoints]
    : partition.subdomains.map((subdomain) => subdomain.predicate);
}
