import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCommandArgs } from './args.js';

describe('parseCommandArgs', () => {
  it('should separate positionals from options', () => {
    expect(parseCommandArgs(['quartic_tail', '--catalog', 'claims.toml', '--config=asv.toml', '--debug'])).toEqual({
      positional: ['quartic_tail'],
      catalog: 'claims.toml',
      config: 'asv.toml',
      debug: true,
      help: false,
    });
  });

  it('should recognise help flags', () => {
    expect(parseCommandArgs(['-h']).help).toBe(true);
    expect(parseCommandArgs(['--help']).help).toBe(true);
  });

  it('should reject unknown options', () => {
    expect(() => parseCommandArgs(['--fast'])).toThrow(CliUsageError);
    expect(() => parseCommandArgs(['--fast'])).toThrow('Unknown option: --fast');
  });

  it('should reject options without a value', () => {
    expect(() => parseCommandArgs(['--catalog'])).toThrow('Option --catalog requires a file path');
    expect(() => parseCommandArgs(['--config='])).toThrow('Option --config requires a file path');
    expect(() => parseCommandArgs(['--catalog', '--debug'])).toThrow('Option --catalog requires a file path');
  });
});
