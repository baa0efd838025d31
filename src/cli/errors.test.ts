import { describe, it, expect } from 'vitest';
import { ClaimCatalogError } from '../claims/index.js';
import { ConfigParseError, EnvCoercionError } from '../config/index.js';
import { OracleUnavailableError } from '../oracle/index.js';
import { CliUsageError } from './args.js';
import { classifyError, formatErrorWithSuggestions, getSuggestions } from './errors.js';

describe('classifyError', () => {
  it('should map each error class to its kind', () => {
    expect(classifyError(new OracleUnavailableError("'wolframscript' could not be launched"))).toBe(
      'oracle_unavailable'
    );
    expect(classifyError(new ConfigParseError('Invalid TOML syntax: x'))).toBe('config_error');
    expect(classifyError(new EnvCoercionError('ASV_DEBUG', 'maybe', 'boolean'))).toBe('config_error');
    expect(classifyError(new ClaimCatalogError("Unknown claim 'x'"))).toBe('catalog_error');
    expect(classifyError(new CliUsageError('Unknown option: --fast'))).toBe('usage_error');
    expect(classifyError(new Error('boom'))).toBe('unknown');
    expect(classifyError('boom')).toBe('unknown');
  });
});

describe('formatErrorWithSuggestions', () => {
  it('should render the message and numbered suggestions without colors', () => {
    expect(formatErrorWithSuggestions('Unknown option: --fast', 'usage_error', { colors: false })).toBe(
      'Error: Unknown option: --fast\n\nSuggestions:\n  1. Show usage information\n    asv help'
    );
  });

  it('should add ANSI codes when colors are on', () => {
    const text = formatErrorWithSuggestions('boom', 'unknown', { colors: true });
    expect(text.startsWith('\x1b[31mError:\x1b[0m boom')).toBe(true);
  });

  it('should offer at least one suggestion for every kind', () => {
    for (const kind of ['oracle_unavailable', 'config_error', 'catalog_error', 'usage_error', 'unknown'] as const) {
      expect(getSuggestions(kind).length).toBeGreaterThan(0);
    }
  });
});
