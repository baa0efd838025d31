import { describe, it, expect } from 'vitest';
import { StubResolutionOracle } from '../../oracle/index.js';
import { createSilentLogger } from '../../utils/logger.js';
import type { CliContext } from '../types.js';
import { getVersionFromPackageJson, handleVersionCommand } from './version.js';

describe('version command', () => {
  it('should read the version from package.json', () => {
    expect(getVersionFromPackageJson()).toBe('0.1.0');
  });

  it('should print the name and version', async () => {
    const out: string[] = [];
    const context: CliContext = {
      args: [],
      env: {},
      io: { out: (line) => out.push(line), err: () => undefined },
      colors: false,
      createOracles: () => Promise.resolve({ resolutionOracle: new StubResolutionOracle() }),
      createLogger: () => createSilentLogger('asv'),
    };

    const result = await handleVersionCommand(context);

    expect(result.exitCode).toBe(0);
    expect(out).toEqual(['asymptotic-verifier v0.1.0']);
  });
});
