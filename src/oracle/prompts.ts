/**
 * Prompts sent to the Proposal Oracle.
 *
 * @packageDocumentation
 */

import type { Claim, InequalityClaim, SeriesBoundClaim } from '../claims/index.js';
import { renderConjunction, renderList } from '../expression/index.js';

const GRAMMAR_RULES = [
  'Write every expression in Wolfram Language syntax: numbers, the symbols allowed below,',
  '+ - * / ^, Log[...], Exp[...], Sqrt[...] and Infinity.',
  'Do not use Floor, Ceiling or any other function.',
  'Reply with the list only, no explanation.',
];

/**
 * Prompt asking for breakpoints that split the summation range into
 * subranges on which the bound is easy to check.
 */
export function buildSeriesProposalPrompt(claim: SeriesBoundClaim): string {
  const [lower, upper] = claim.summationBounds;
  const parameters = claim.otherVariables.length === 0 ? '(none)' : claim.otherVariables.join(', ');

  return [
    'Split the summation range of a series into subranges so that, on each subrange,',
    'the sum is easily bounded by a constant multiple of the target.',
    '',
    `Summand: ${claim.formula}`,
    `Summation index: ${claim.summationIndex}`,
    `Summation range: ${lower} to ${upper}`,
    `Parameters: ${parameters}`,
    `Conditions on the parameters: ${claim.conditions}`,
    `Target bound: ${claim.conjecturedUpperBound}`,
    '',
    'f << g means f <= C*g on the whole domain for some constant C > 0.',
    `Return a bracketed list [${lower}, b1, ..., bn, ${upper}] of nondecreasing breakpoints.`,
    `Breakpoints may use only the parameters, never ${claim.summationIndex}.`,
    'Pick breakpoints where the dominant term of the summand changes and keep the list short.',
    ...GRAMMAR_RULES,
  ].join('\n');
}

/**
 * Prompt asking for subdomains that together cover the claim's domain.
 */
export function buildInequalityProposalPrompt(claim: InequalityClaim): string {
  return [
    'Split the domain of an inequality into subdomains so that, on each subdomain,',
    'the left side is easily bounded by a constant multiple of the right side.',
    '',
    `Variables: ${renderList(claim.variables)}`,
    `Domain: ${renderConjunction(claim.domain)}`,
    `Left side: ${claim.lhs}`,
    `Right side: ${claim.rhs}`,
    '',
    'The subdomains must cover the whole domain.',
    'Return a bracketed list [p1, p2, ..., pn] where each pi is a condition on the variables,',
    'with several conditions joined by &&.',
    'Split where the dominant term of either side changes and keep the list short.',
    ...GRAMMAR_RULES,
  ].join('\n');
}

/**
 * Prompt for either claim kind.
 */
export function buildProposalPrompt(claim: Claim): string {
  return claim.kind === 'series' ? buildSeriesProposalPrompt(claim) : buildInequalityProposalPrompt(claim);
}
