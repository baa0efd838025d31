/**
 * Configuration types for asymptotic.toml.
 *
 * Field names follow the TOML keys.
 *
 * @packageDocumentation
 */

import type { DisproofPolicy } from '../search/index.js';

/**
 * How the resolution oracle is reached.
 */
export type OracleTransportKind = 'local' | 'remote';

/**
 * `[oracle]` section.
 */
export interface OracleConfig {
  /** `local` runs an executable; `remote` posts to an evaluation endpoint. */
  transport: OracleTransportKind;
  /** Executable for the local transport. */
  executable: string;
  /** Evaluation URL for the remote transport. */
  endpoint: string | undefined;
  /** Wall-clock limit per oracle call, in milliseconds. */
  timeout_ms: number;
}

/**
 * `[proposal]` section. The proposal oracle is an external command that
 * reads a prompt on stdin and prints its proposal.
 */
export interface ProposalConfig {
  enabled: boolean;
  command: string | undefined;
  args: string[];
  timeout_ms: number;
}

/**
 * Inclusive exponent range, written in TOML as `[from, to]`.
 */
export interface RangeConfig {
  from: number;
  to: number;
}

/**
 * `[search]` section.
 */
export interface SearchConfig {
  max_attempts: number;
  disproof_policy: DisproofPolicy;
  series_initial: RangeConfig;
  series_retry: RangeConfig;
  inequality_initial: RangeConfig;
  inequality_retry: RangeConfig;
}

/**
 * `[logging]` section.
 */
export interface LoggingConfig {
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  oracle: OracleConfig;
  proposal: ProposalConfig;
  search: SearchConfig;
  logging: LoggingConfig;
}

/**
 * Configuration with every section and field optional, as produced by
 * environment overrides.
 */
export type PartialConfig = {
  [K in keyof Config]?: Partial<Config[K]>;
};
