/**
 * Error suggestion system for the asv CLI.
 *
 * Maps fatal errors to short, actionable suggestions.
 *
 * @packageDocumentation
 */

import { ClaimCatalogError, ClaimValidationError } from '../claims/index.js';
import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { OracleTransportError, OracleUnavailableError } from '../oracle/index.js';
import { PathValidationError } from '../utils/safe-fs.js';
import { CliUsageError } from './args.js';

/**
 * Kinds of fatal CLI errors.
 */
export type ErrorType = 'oracle_unavailable' | 'config_error' | 'catalog_error' | 'usage_error' | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Display options for error output.
 */
export interface ErrorDisplayOptions {
  colors: boolean;
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  oracle_unavailable: [
    {
      text: 'Check that the oracle executable is installed and on PATH',
      action: 'wolframscript -version',
    },
    {
      text: 'Point the verifier at another executable',
      action: 'export WOLFRAMSCRIPT=/path/to/wolframscript',
    },
    {
      text: 'Or use a remote evaluation endpoint',
      action: 'export WOLFRAM_API_URL=https://...',
    },
  ],

  config_error: [
    {
      text: 'Check the field named in the message against the documented sections',
      action: '[oracle], [proposal], [search], [logging]',
    },
    {
      text: 'Check ASV_* and WOLFRAM_* environment variables',
      action: 'env | grep -E "^(ASV|WOLFRAM)_"',
    },
  ],

  catalog_error: [
    {
      text: 'Check the claim named in the message',
    },
    {
      text: 'List the claims the catalog defines',
      action: 'asv list --catalog <file>',
    },
  ],

  usage_error: [
    {
      text: 'Show usage information',
      action: 'asv help',
    },
  ],

  unknown: [
    {
      text: 'Re-run with debug logging for more detail',
      action: 'asv run <claim> --debug',
    },
  ],
};

/**
 * Classifies an error thrown by a command.
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof OracleUnavailableError || error instanceof OracleTransportError) {
    return 'oracle_unavailable';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'config_error';
  }
  if (
    error instanceof ClaimCatalogError ||
    error instanceof ClaimValidationError ||
    error instanceof PathValidationError
  ) {
    return 'catalog_error';
  }
  if (error instanceof CliUsageError) {
    return 'usage_error';
  }
  return 'unknown';
}

/**
 * Gets suggestions for a given error type.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

function formatSuggestion(suggestion: Suggestion, index: number, options: ErrorDisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @example
 * ```typescript
 * formatErrorWithSuggestions('Unknown option: --fast', 'usage_error', { colors: false });
 * // 'Error: Unknown option: --fast\n\nSuggestions:\n  1. Show usage information\n    asv help'
 * ```
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  errorType: ErrorType,
  options: ErrorDisplayOptions = { colors: true }
): string {
  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  getSuggestions(errorType).forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}
