/**
 * Environment variable overrides for configuration.
 *
 * `ASV_<SECTION>_<FIELD>` variables override the matching config value.
 * The oracle also honours `WOLFRAMSCRIPT` (executable), `WOLFRAM_API_URL`
 * (remote endpoint, selects the remote transport) and `WOLFRAM_TIMEOUT`
 * (seconds); an `ASV_*` variable wins over these when both are set.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { DISPROOF_POLICIES } from '../search/index.js';
import type { Config, OracleTransportKind, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvVarMapping =
  | {
      readonly type: 'string';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
    }
  | {
      readonly type: 'number';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: number, envVar: string) => void;
    }
  | {
      readonly type: 'boolean';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: boolean, envVar: string) => void;
    };

function toTransport(value: string, envVar: string): OracleTransportKind {
  const trimmed = value.trim();
  if (trimmed !== 'local' && trimmed !== 'remote') {
    throw new EnvCoercionError(envVar, value, "'local' or 'remote'");
  }
  return trimmed;
}

/**
 * Supported variables, applied in this order so that later entries win.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvVarMapping> = new Map<string, EnvVarMapping>([
  [
    'WOLFRAMSCRIPT',
    {
      type: 'string',
      description: 'Path of the local oracle executable',
      apply: (o, v) => {
        o.oracle = { ...o.oracle, executable: v };
      },
    },
  ],
  [
    'WOLFRAM_API_URL',
    {
      type: 'string',
      description: 'Remote evaluation endpoint; selects the remote transport',
      apply: (o, v) => {
        o.oracle = { ...o.oracle, transport: 'remote', endpoint: v };
      },
    },
  ],
  [
    'WOLFRAM_TIMEOUT',
    {
      type: 'number',
      description: 'Oracle call timeout in seconds',
      apply: (o, v) => {
        o.oracle = { ...o.oracle, timeout_ms: v * 1000 };
      },
    },
  ],
  [
    'ASV_ORACLE_TRANSPORT',
    {
      type: 'string',
      description: 'Oracle transport (local, remote)',
      apply: (o, v, envVar) => {
        o.oracle = { ...o.oracle, transport: toTransport(v, envVar) };
      },
    },
  ],
  [
    'ASV_ORACLE_EXECUTABLE',
    {
      type: 'string',
      description: 'Path of the local oracle executable',
      apply: (o, v) => {
        o.oracle = { ...o.oracle, executable: v };
      },
    },
  ],
  [
    'ASV_ORACLE_ENDPOINT',
    {
      type: 'string',
      description: 'Remote evaluation endpoint',
      apply: (o, v) => {
        o.oracle = { ...o.oracle, endpoint: v };
      },
    },
  ],
  [
    'ASV_ORACLE_TIMEOUT_MS',
    {
      type: 'number',
      description: 'Oracle call timeout in milliseconds',
      apply: (o, v) => {
        o.oracle = { ...o.oracle, timeout_ms: v };
      },
    },
  ],
  [
    'ASV_PROPOSAL_COMMAND',
    {
      type: 'string',
      description: 'Proposal oracle command; enables proposals',
      apply: (o, v) => {
        o.proposal = { ...o.proposal, command: v, enabled: true };
      },
    },
  ],
  [
    'ASV_PROPOSAL_ENABLED',
    {
      type: 'boolean',
      description: 'Enable or disable the proposal oracle (true/false)',
      apply: (o, v) => {
        o.proposal = { ...o.proposal, enabled: v };
      },
    },
  ],
  [
    'ASV_PROPOSAL_TIMEOUT_MS',
    {
      type: 'number',
      description: 'Proposal oracle timeout in milliseconds',
      apply: (o, v) => {
        o.proposal = { ...o.proposal, timeout_ms: v };
      },
    },
  ],
  [
    'ASV_MAX_ATTEMPTS',
    {
      type: 'number',
      description: 'Proposal cycles per claim (shortcut for ASV_SEARCH_MAX_ATTEMPTS)',
      apply: (o, v) => {
        o.search = { ...o.search, max_attempts: v };
      },
    },
  ],
  [
    'ASV_SEARCH_MAX_ATTEMPTS',
    {
      type: 'number',
      description: 'Proposal cycles per claim',
      apply: (o, v) => {
        o.search = { ...o.search, max_attempts: v };
      },
    },
  ],
  [
    'ASV_SEARCH_DISPROOF_POLICY',
    {
      type: 'string',
      description: `Disproof policy (${DISPROOF_POLICIES.join(', ')})`,
      apply: (o, v, envVar) => {
        const policy = DISPROOF_POLICIES.find((candidate) => candidate === v.trim());
        if (policy === undefined) {
          throw new EnvCoercionError(envVar, v, DISPROOF_POLICIES.join(' or '));
        }
        o.search = { ...o.search, disproof_policy: policy };
      },
    },
  ],
  [
    'ASV_DEBUG',
    {
      type: 'boolean',
      description: 'Enable debug logging (shortcut for ASV_LOGGING_DEBUG)',
      apply: (o, v) => {
        o.logging = { ...o.logging, debug: v };
      },
    },
  ],
  [
    'ASV_LOGGING_DEBUG',
    {
      type: 'boolean',
      description: 'Enable debug logging',
      apply: (o, v) => {
        o.logging = { ...o.logging, debug: v };
      },
    },
  ],
]);

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts `true`, `1`, `yes`, `on` and `false`, `0`, `no`, `off`,
 * case-insensitively.
 *
 * @throws EnvCoercionError if the value is none of those.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function applyMapping(overrides: PartialConfig, mapping: EnvVarMapping, value: string, envVar: string): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(overrides, value, envVar);
      return;
    case 'number':
      mapping.apply(overrides, coerceToNumber(value, envVar), envVar);
      return;
    case 'boolean':
      mapping.apply(overrides, coerceToBoolean(value, envVar), envVar);
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied, in application order. */
  appliedVars: string[];
  /** Coercion errors, when collected. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 * Unset and empty variables are skipped.
 *
 * @param env - The environment to read from.
 * @param options - Set `collectErrors` to gather coercion errors instead of
 * throwing the first one.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ WOLFRAM_TIMEOUT: '30' });
 * // { oracle: { timeout_ms: 30000 } }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    oracle: { ...base.oracle, ...partial.oracle },
    proposal: { ...base.proposal, ...partial.proposal },
    search: { ...base.search, ...partial.search },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @throws EnvCoercionError on the first variable that cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    [...ENV_VAR_MAPPINGS].map(([envVar, mapping]) => [envVar, { description: mapping.description, type: mapping.type }])
  );
}
