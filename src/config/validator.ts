/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser's type checks cannot: ranges are ascending,
 * limits are positive, and the selected transport has what it needs.
 *
 * @packageDocumentation
 */

import type { Config, RangeConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  /** Empty if valid. */
  errors: ValidationError[];
}

function validatePositiveInteger(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({ field, value, message: `Must be a positive integer, got ${String(value)}` });
  }
}

function validateTimeout(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({ field, value, message: `Must be a finite positive number of milliseconds, got ${String(value)}` });
  }
}

function validateAscending(range: RangeConfig, field: string, errors: ValidationError[]): void {
  if (range.from > range.to) {
    errors.push({
      field,
      value: [range.from, range.to],
      message: `Range must be ascending, got ${String(range.from)}..${String(range.to)}`,
    });
  }
}

function validateEndpoint(endpoint: string | undefined, errors: ValidationError[]): void {
  if (endpoint === undefined || endpoint.trim() === '') {
    errors.push({ field: 'oracle.endpoint', value: endpoint, message: 'Required when oracle.transport is remote' });
    return;
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    errors.push({ field: 'oracle.endpoint', value: endpoint, message: `Not a valid URL: '${endpoint}'` });
    return;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    errors.push({
      field: 'oracle.endpoint',
      value: endpoint,
      message: `Must use http or https, got '${url.protocol}'`,
    });
  }
}

/**
 * Validates a configuration and returns all failures at once.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   console.error(result.errors);
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.oracle.transport === 'remote') {
    validateEndpoint(config.oracle.endpoint, errors);
  } else if (config.oracle.executable.trim() === '') {
    errors.push({
      field: 'oracle.executable',
      value: config.oracle.executable,
      message: 'Required when oracle.transport is local',
    });
  }
  validateTimeout(config.oracle.timeout_ms, 'oracle.timeout_ms', errors);

  if (config.proposal.enabled && (config.proposal.command === undefined || config.proposal.command.trim() === '')) {
    errors.push({
      field: 'proposal.command',
      value: config.proposal.command,
      message: 'Required when proposal.enabled is true',
    });
  }
  validateTimeout(config.proposal.timeout_ms, 'proposal.timeout_ms', errors);

  validatePositiveInteger(config.search.max_attempts, 'search.max_attempts', errors);
  validateAscending(config.search.series_initial, 'search.series_initial', errors);
  validateAscending(config.search.series_retry, 'search.series_retry', errors);
  validateAscending(config.search.inequality_initial, 'search.inequality_initial', errors);
  validateAscending(config.search.inequality_retry, 'search.inequality_retry', errors);

  return { valid: errors.length === 0, errors };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError listing every failure.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
