/**
 * Resolution Oracle query construction.
 *
 * @packageDocumentation
 */

export type { ForallQuery, SubrangeQuery } from './types.js';
export { QueryBuildError } from './types.js';
export {
  buildInequalityQuery,
  buildSeriesQueries,
  buildSeriesProgram,
  renderForallProgram,
  scaledBound,
} from './builder.js';
export { SERIES_PRELUDE } from './wolfram-prelude.js';
