/**
 * Oracle interfaces, clients and stubs.
 *
 * @packageDocumentation
 */

export type { OracleVerdict, ProposalOracle, ResolutionOracle, OracleTransport } from './types.js';
export {
  DEFAULT_ORACLE_TIMEOUT_MS,
  OracleTransportError,
  OracleUnavailableError,
  toOracleTransportError,
} from './types.js';
export {
  WolframResolutionOracle,
  createWolframResolutionOracle,
  checkWolframScript,
  sanitizedEnvironment,
  type WolframResolutionOracleOptions,
} from './wolfram-client.js';
export { CommandProposalOracle, type CommandProposalOracleOptions } from './proposal-client.js';
export { buildProposalPrompt, buildSeriesProposalPrompt, buildInequalityProposalPrompt } from './prompts.js';
export { parseSeriesPayload, toOracleVerdict, type SeriesPayload } from './payload.js';
export {
  StubResolutionOracle,
  StubProposalOracle,
  ALL_TRUE_SERIES_PAYLOAD,
  type StubResolutionOracleOptions,
  type ForallResponder,
  type EvaluateResponder,
  type ProposalResponder,
} from './stubs.js';
