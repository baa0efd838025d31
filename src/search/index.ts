/**
 * Constant-exponent search.
 *
 * @packageDocumentation
 */

export type {
  ExponentRange,
  DisproofPolicy,
  VerificationAttempt,
  SearchOutcome,
  SearchResult,
  InequalitySearchOptions,
  SeriesSearchOptions,
} from './types.js';
export { DISPROOF_POLICIES } from './types.js';
export { exponentsOf, searchInequalityConstant, searchSeriesConstant } from './constant-search.js';
