import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigParseError, DEFAULT_CONFIG, getDefaultConfig, loadConfig, parseConfig } from './index.js';

describe('Config Parser', () => {
  describe('parseConfig', () => {
    it('should parse empty TOML to default config', () => {
      expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
    });

    it('should parse a complete configuration', () => {
      const config = parseConfig(`
[oracle]
transport = "remote"
executable = "/opt/wolfram/wolframscript"
endpoint = "https://oracle.example.test/eval"
timeout_ms = 60000

[proposal]
command = "propose-partition"
args = ["--model", "small"]
timeout_ms = 30000

[search]
max_attempts = 3
disproof_policy = "largest-constant"
series_initial = [0, 1]
series_retry = [-1, 5]
inequality_initial = [0, 2]
inequality_retry = [-2, 6]

[logging]
debug = true
`);

      expect(config).toEqual({
        oracle: {
          transport: 'remote',
          executable: '/opt/wolfram/wolframscript',
          endpoint: 'https://oracle.example.test/eval',
          timeout_ms: 60000,
        },
        proposal: { enabled: true, command: 'propose-partition', args: ['--model', 'small'], timeout_ms: 30000 },
        search: {
          max_attempts: 3,
          disproof_policy: 'largest-constant',
          series_initial: { from: 0, to: 1 },
          series_retry: { from: -1, to: 5 },
          inequality_initial: { from: 0, to: 2 },
          inequality_retry: { from: -2, to: 6 },
        },
        logging: { debug: true },
      });
    });

    it('should merge partial sections with defaults', () => {
      const config = parseConfig(`
[search]
max_attempts = 2
`);

      expect(config.search.max_attempts).toBe(2);
      expect(config.search.disproof_policy).toBe('first-false');
      expect(config.search.series_retry).toEqual({ from: 0, to: 4 });
      expect(config.oracle).toEqual(DEFAULT_CONFIG.oracle);
    });

    it('should keep proposals disabled when a command is disabled explicitly', () => {
      const config = parseConfig(`
[proposal]
command = "propose-partition"
enabled = false
`);

      expect(config.proposal.enabled).toBe(false);
      expect(config.proposal.command).toBe('propose-partition');
    });

    it('should ignore unknown keys and sections', () => {
      const config = parseConfig(`
[oracle]
colour = "blue"

[extras]
anything = 1
`);

      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should not share nested objects with the defaults', () => {
      const config = parseConfig('');
      config.proposal.args.push('--mutated');
      config.search.series_retry.to = 99;

      expect(DEFAULT_CONFIG.proposal.args).toEqual([]);
      expect(DEFAULT_CONFIG.search.series_retry.to).toBe(4);
      expect(DEFAULT_CONFIG.search.inequality_retry).toEqual({ from: -2, to: 6 });
    });
  });

  describe('invalid input', () => {
    it('should throw ConfigParseError for invalid TOML syntax', () => {
      expect(() => parseConfig('[oracle\ntransport = ')).toThrow(ConfigParseError);
      expect(() => parseConfig('[oracle\ntransport = ')).toThrow(/^Invalid TOML syntax: /);
    });

    it('should keep the TOML error as the cause', () => {
      try {
        parseConfig('= 1');
        expect.fail('expected a parse error');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigParseError);
        expect(error instanceof ConfigParseError ? error.cause : undefined).toBeInstanceOf(Error);
      }
    });

    it('should report the field path of a wrongly typed value', () => {
      expect(() => parseConfig('[oracle]\ntimeout_ms = "fast"')).toThrow(
        "Invalid type for 'oracle.timeout_ms': expected number, got string"
      );
      expect(() => parseConfig('[logging]\ndebug = "yes"')).toThrow(
        "Invalid type for 'logging.debug': expected boolean, got string"
      );
      expect(() => parseConfig('[proposal]\nargs = "--fast"')).toThrow(
        "Invalid type for 'proposal.args': expected array of strings, got string"
      );
    });

    it('should reject a section that is not a table', () => {
      expect(() => parseConfig('search = 3')).toThrow("Invalid type for 'search': expected table, got number");
    });

    it('should reject unknown transports and policies', () => {
      expect(() => parseConfig('[oracle]\ntransport = "carrier-pigeon"')).toThrow(
        "Invalid value for 'oracle.transport': expected 'local' or 'remote', got 'carrier-pigeon'"
      );
      expect(() => parseConfig('[search]\ndisproof_policy = "never"')).toThrow(
        "Invalid value for 'search.disproof_policy': expected one of first-false, largest-constant, got 'never'"
      );
    });

    it('should reject malformed ranges', () => {
      expect(() => parseConfig('[search]\nseries_retry = [0, 1, 2]')).toThrow(
        "Invalid value for 'search.series_retry': expected [from, to]"
      );
      expect(() => parseConfig('[search]\nseries_retry = [0.5, 1.5]')).toThrow(
        "Invalid value for 'search.series_retry': endpoints must be integers"
      );
    });

    it('should round-trip any positive attempt budget', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1000 }), (attempts) => {
          expect(parseConfig(`[search]\nmax_attempts = ${String(attempts)}`).search.max_attempts).toBe(attempts);
        })
      );
    });
  });

  describe('getDefaultConfig / loadConfig', () => {
    it('should return a fresh default config', () => {
      expect(getDefaultConfig()).toEqual(DEFAULT_CONFIG);
      expect(getDefaultConfig()).not.toBe(getDefaultConfig());
    });

    it('should load a config file from disk', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'asv-config-'));
      try {
        const file = join(dir, 'asymptotic.toml');
        await writeFile(file, '[search]\nmax_attempts = 7\n', 'utf-8');

        const config = await loadConfig(file);

        expect(config.search.max_attempts).toBe(7);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('should wrap read failures in ConfigParseError', async () => {
      const missing = join(tmpdir(), 'asv-config-missing', 'asymptotic.toml');
      await expect(loadConfig(missing)).rejects.toThrow(ConfigParseError);
      await expect(loadConfig(missing)).rejects.toThrow(`Failed to read config '${missing}'`);
    });
  });
});
