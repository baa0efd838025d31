/**
 * TOML configuration parser for asymptotic.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DISPROOF_POLICIES, type DisproofPolicy } from '../search/index.js';
import { isRecord } from '../utils/guards.js';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { DEFAULT_LOGGING, DEFAULT_ORACLE, DEFAULT_PROPOSAL, DEFAULT_SEARCH } from './defaults.js';
import type {
  Config,
  LoggingConfig,
  OracleConfig,
  OracleTransportKind,
  ProposalConfig,
  RangeConfig,
  SearchConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function typeName(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected string, got ${typeName(value)}`);
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected number, got ${typeName(value)}`);
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected boolean, got ${typeName(value)}`);
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected array of strings, got ${typeName(value)}`);
  }
  return value.map((entry, i) => validateString(entry, `${fieldPath}[${String(i)}]`));
}

/**
 * Reads a `[from, to]` pair of integers.
 */
function validateRange(value: unknown, fieldPath: string): RangeConfig {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': expected [from, to]`);
  }
  const [from, to] = value.map((entry: unknown, i) => validateNumber(entry, `${fieldPath}[${String(i)}]`));
  if (from === undefined || to === undefined || !Number.isInteger(from) || !Number.isInteger(to)) {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': endpoints must be integers`);
  }
  return { from, to };
}

function validateTransport(value: unknown, fieldPath: string): OracleTransportKind {
  const transport = validateString(value, fieldPath);
  if (transport !== 'local' && transport !== 'remote') {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': expected 'local' or 'remote', got '${transport}'`);
  }
  return transport;
}

function validatePolicy(value: unknown, fieldPath: string): DisproofPolicy {
  const policy = validateString(value, fieldPath);
  const known = DISPROOF_POLICIES.find((candidate) => candidate === policy);
  if (known === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${DISPROOF_POLICIES.join(', ')}, got '${policy}'`
    );
  }
  return known;
}

/**
 * Returns a section table, or undefined when the section is absent.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const raw = parsed[name];
  if (raw === undefined) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeName(raw)}`);
  }
  return raw;
}

function parseOracle(raw: Record<string, unknown> | undefined): OracleConfig {
  const result: OracleConfig = { ...DEFAULT_ORACLE };
  if (raw === undefined) {
    return result;
  }

  if ('transport' in raw) {
    result.transport = validateTransport(raw.transport, 'oracle.transport');
  }
  if ('executable' in raw) {
    result.executable = validateString(raw.executable, 'oracle.executable');
  }
  if ('endpoint' in raw) {
    result.endpoint = validateString(raw.endpoint, 'oracle.endpoint');
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'oracle.timeout_ms');
  }

  return result;
}

function parseProposal(raw: Record<string, unknown> | undefined): ProposalConfig {
  const result: ProposalConfig = { ...DEFAULT_PROPOSAL, args: [...DEFAULT_PROPOSAL.args] };
  if (raw === undefined) {
    return result;
  }

  if ('enabled' in raw) {
    result.enabled = validateBoolean(raw.enabled, 'proposal.enabled');
  }
  if ('command' in raw) {
    result.command = validateString(raw.command, 'proposal.command');
    // A configured command turns proposals on unless disabled explicitly.
    if (!('enabled' in raw)) {
      result.enabled = true;
    }
  }
  if ('args' in raw) {
    result.args = validateStringArray(raw.args, 'proposal.args');
  }
  if ('timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'proposal.timeout_ms');
  }

  return result;
}

function parseSearch(raw: Record<string, unknown> | undefined): SearchConfig {
  const result: SearchConfig = {
    ...DEFAULT_SEARCH,
    series_initial: { ...DEFAULT_SEARCH.series_initial },
    series_retry: { ...DEFAULT_SEARCH.series_retry },
    inequality_initial: { ...DEFAULT_SEARCH.inequality_initial },
    inequality_retry: { ...DEFAULT_SEARCH.inequality_retry },
  };
  if (raw === undefined) {
    return result;
  }

  if ('max_attempts' in raw) {
    result.max_attempts = validateNumber(raw.max_attempts, 'search.max_attempts');
  }
  if ('disproof_policy' in raw) {
    result.disproof_policy = validatePolicy(raw.disproof_policy, 'search.disproof_policy');
  }
  if ('series_initial' in raw) {
    result.series_initial = validateRange(raw.series_initial, 'search.series_initial');
  }
  if ('series_retry' in raw) {
    result.series_retry = validateRange(raw.series_retry, 'search.series_retry');
  }
  if ('inequality_initial' in raw) {
    result.inequality_initial = validateRange(raw.inequality_initial, 'search.inequality_initial');
  }
  if ('inequality_retry' in raw) {
    result.inequality_retry = validateRange(raw.inequality_retry, 'search.inequality_retry');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Missing sections and fields take their defaults; unknown keys are
 * ignored.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [oracle]
 * timeout_ms = 60000
 *
 * [search]
 * max_attempts = 3
 * `);
 * console.log(config.search.max_attempts); // 3
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    oracle: parseOracle(section(parsed, 'oracle')),
    proposal: parseProposal(section(parsed, 'proposal')),
    search: parseSearch(section(parsed, 'search')),
    logging: parseLogging(section(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}

/**
 * Reads and parses a configuration file.
 *
 * @throws ConfigParseError if the file cannot be read or parsed.
 */
export async function loadConfig(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Failed to read config '${filePath}': ${cause.message}`, cause);
  }
  return parseConfig(content);
}
