/**
 * Claim records, construction and the TOML claim catalog.
 *
 * @packageDocumentation
 */

export type {
  Claim,
  ClaimKind,
  SeriesBoundClaim,
  InequalityClaim,
  SeriesClaimInput,
  InequalityClaimInput,
} from './types.js';
export { ClaimValidationError, isSeriesClaim, isInequalityClaim, describeClaim } from './types.js';
export { createSeriesClaim, createInequalityClaim, parseSymbolList, parseDomain } from './claims.js';
export { ClaimCatalogError, parseClaimCatalog, loadClaimCatalog, type ClaimCatalog } from './catalog.js';
