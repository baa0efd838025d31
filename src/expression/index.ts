/**
 * Expression helpers for the resolution-oracle grammar.
 *
 * @packageDocumentation
 */

export {
  normalizeExpression,
  normalizeBoundExpression,
  canonicalKey,
  isAscii,
  hasBalancedDelimiters,
  findMatchingClose,
  splitTopLevel,
  unwrapBraces,
  splitConjuncts,
  parenthesizeDisjunction,
  dedupePreservingOrder,
  renderConjunction,
  renderList,
} from './normalize.js';
export { BUILTIN_CONSTANTS, freeSymbols, foreignSymbols } from './symbols.js';
