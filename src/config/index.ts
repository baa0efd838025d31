/**
 * Configuration module for asymptotic.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig, loadConfig } from './parser.js';
export type {
  Config,
  LoggingConfig,
  OracleConfig,
  OracleTransportKind,
  PartialConfig,
  ProposalConfig,
  RangeConfig,
  SearchConfig,
} from './types.js';
export { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_ORACLE, DEFAULT_PROPOSAL, DEFAULT_SEARCH } from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export { EnvCoercionError, readEnvOverrides, applyEnvOverrides, getEnvVarDocumentation } from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { resolveTransport, toVerificationSettings, resolveConfig, type ResolveConfigOptions } from './resolve.js';
