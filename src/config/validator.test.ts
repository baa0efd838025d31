import { describe, expect, it } from 'vitest';
import { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Config Validator', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
  });

  it('should require an endpoint for the remote transport', () => {
    const result = validateConfig(parseConfig('[oracle]\ntransport = "remote"'));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { field: 'oracle.endpoint', value: undefined, message: 'Required when oracle.transport is remote' },
    ]);
  });

  it('should require an http(s) endpoint', () => {
    const ftp = validateConfig(parseConfig('[oracle]\ntransport = "remote"\nendpoint = "ftp://oracle.example.test"'));
    expect(ftp.errors[0]?.message).toBe("Must use http or https, got 'ftp:'");

    const garbled = validateConfig(parseConfig('[oracle]\ntransport = "remote"\nendpoint = "not a url"'));
    expect(garbled.errors[0]?.message).toBe("Not a valid URL: 'not a url'");
  });

  it('should require a command when proposals are enabled', () => {
    const result = validateConfig(parseConfig('[proposal]\nenabled = true'));

    expect(result.errors.map((e) => e.field)).toEqual(['proposal.command']);
  });

  it('should reject non-positive limits and descending ranges', () => {
    const config = parseConfig(`
[oracle]
timeout_ms = 0

[search]
max_attempts = 0
inequality_retry = [6, -2]
`);

    const result = validateConfig(config);

    expect(result.errors.map((e) => e.field)).toEqual([
      'oracle.timeout_ms',
      'search.max_attempts',
      'search.inequality_retry',
    ]);
    expect(result.errors[2]?.message).toBe('Range must be ascending, got 6..-2');
  });

  it('should throw ConfigValidationError listing every failure', () => {
    const config = parseConfig('[search]\nmax_attempts = 1.5\nseries_initial = [2, 1]');

    expect(() => assertConfigValid(config)).toThrow(ConfigValidationError);
    expect(() => assertConfigValid(config)).toThrow(
      'Configuration validation failed with 2 error(s):\n' +
        '  - search.max_attempts: Must be a positive integer, got 1.5\n' +
        '  - search.series_initial: Range must be ascending, got 2..1'
    );
  });
});
