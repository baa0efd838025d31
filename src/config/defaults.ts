/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import { DEFAULT_ORACLE_TIMEOUT_MS } from '../oracle/index.js';
import type { Config, LoggingConfig, OracleConfig, ProposalConfig, SearchConfig } from './types.js';

/**
 * Local `wolframscript` found on PATH.
 */
export const DEFAULT_ORACLE: OracleConfig = {
  transport: 'local',
  executable: 'wolframscript',
  endpoint: undefined,
  timeout_ms: DEFAULT_ORACLE_TIMEOUT_MS,
};

/**
 * No proposal oracle: every attempt uses the claim's default partition.
 */
export const DEFAULT_PROPOSAL: ProposalConfig = {
  enabled: false,
  command: undefined,
  args: [],
  timeout_ms: DEFAULT_ORACLE_TIMEOUT_MS,
};

export const DEFAULT_SEARCH: SearchConfig = {
  max_attempts: 5,
  disproof_policy: 'first-false',
  series_initial: { from: 0, to: 0 },
  series_retry: { from: 0, to: 4 },
  inequality_initial: { from: 0, to: 0 },
  inequality_retry: { from: -2, to: 6 },
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  oracle: DEFAULT_ORACLE,
  proposal: DEFAULT_PROPOSAL,
  search: DEFAULT_SEARCH,
  logging: DEFAULT_LOGGING,
};
