/**
 * Turning a validated configuration into the values the oracles and the
 * controller take.
 *
 * @packageDocumentation
 */

import type { OracleTransport } from '../oracle/index.js';
import type { VerificationSettings } from '../verification/index.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultConfig, loadConfig } from './parser.js';
import type { Config } from './types.js';
import { ConfigValidationError, assertConfigValid } from './validator.js';

/**
 * Builds the oracle transport selected by `[oracle]`.
 *
 * @throws ConfigValidationError if the remote transport has no endpoint.
 */
export function resolveTransport(config: Config): OracleTransport {
  const { oracle } = config;
  if (oracle.transport === 'local') {
    return { kind: 'local', executable: oracle.executable };
  }
  if (oracle.endpoint === undefined || oracle.endpoint.trim() === '') {
    const message = 'Required when oracle.transport is remote';
    throw new ConfigValidationError(`oracle.endpoint: ${message}`, [
      { field: 'oracle.endpoint', value: oracle.endpoint, message },
    ]);
  }
  return { kind: 'remote', endpoint: oracle.endpoint };
}

/**
 * Builds controller settings from `[search]`.
 */
export function toVerificationSettings(config: Config): VerificationSettings {
  const { search } = config;
  return {
    maxAttempts: search.max_attempts,
    policy: search.disproof_policy,
    ranges: {
      series: { initial: { ...search.series_initial }, retry: { ...search.series_retry } },
      inequality: { initial: { ...search.inequality_initial }, retry: { ...search.inequality_retry } },
    },
  };
}

/**
 * Options for {@link resolveConfig}.
 */
export interface ResolveConfigOptions {
  /** Config file; defaults apply when absent. */
  readonly path?: string | undefined;
  readonly env?: EnvRecord | undefined;
}

/**
 * Loads the config file (if any), applies environment overrides and
 * validates the result.
 *
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<Config> {
  const base = options.path === undefined ? getDefaultConfig() : await loadConfig(options.path);
  const config = applyEnvOverrides(base, options.env ?? process.env);
  assertConfigValid(config);
  return config;
}
