import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ClaimCatalogError, loadClaimCatalog, parseClaimCatalog } from './index.js';

const SAMPLE_CATALOG = fileURLToPath(new URL('../../examples/claims.toml', import.meta.url));

describe('parseClaimCatalog', () => {
  it('should parse series and inequality tables in order', () => {
    const catalog = parseClaimCatalog(`
[series.quartic]
formula = "1/d^4"
index = "d"
bounds = ["1", "Infinity"]
bound = "1"

[inequality.linear]
variables = ["x"]
domain = ["x > 1"]
lhs = "x"
rhs = "x"
`);

    expect([...catalog.keys()]).toEqual(['quartic', 'linear']);
    expect(catalog.get('quartic')).toEqual({
      kind: 'series',
      name: 'quartic',
      formula: '1/d^4',
      summationIndex: 'd',
      otherVariables: [],
      summationBounds: ['1', 'Infinity'],
      conditions: 'True',
      conjecturedUpperBound: '1',
    });
    expect(catalog.get('linear')).toEqual({
      kind: 'inequality',
      name: 'linear',
      variables: ['x'],
      domain: ['x > 1'],
      lhs: 'x',
      rhs: 'x',
    });
  });

  it('should accept integer bounds', () => {
    const catalog = parseClaimCatalog(
      '[series.finite]\nformula = "d^2"\nindex = "d"\nbounds = [0, 10]\nbound = "1"'
    );
    const claim = catalog.get('finite');
    expect(claim?.kind === 'series' ? claim.summationBounds : undefined).toEqual(['0', '10']);
  });

  it('should report TOML syntax errors', () => {
    expect(() => parseClaimCatalog('[series')).toThrow(/Invalid TOML syntax/);
  });

  it('should reject unknown sections', () => {
    expect(() => parseClaimCatalog('[integral.a]\nformula = "x"')).toThrow(
      "Unknown section 'integral': expected one of series, inequality"
    );
  });

  it('should reject duplicate names across sections', () => {
    const toml = `
[series.same]
formula = "1/d^2"
index = "d"
bounds = ["1", "Infinity"]
bound = "1"

[inequality.same]
variables = ["x"]
lhs = "x"
rhs = "x"
`;
    expect(() => parseClaimCatalog(toml)).toThrow("Duplicate claim name 'same'");
  });

  it('should report missing fields with their path', () => {
    try {
      parseClaimCatalog('[inequality.broken]\nvariables = ["x"]\nlhs = "x"');
      expect.unreachable('expected a catalog error');
    } catch (error) {
      expect(error).toBeInstanceOf(ClaimCatalogError);
      expect((error as ClaimCatalogError).path).toBe('inequality.broken.rhs');
    }
  });

  it('should wrap claim validation failures', () => {
    try {
      parseClaimCatalog('[inequality.bad]\nvariables = ["x"]\nlhs = "x*y"\nrhs = "x"');
      expect.unreachable('expected a catalog error');
    } catch (error) {
      expect(error).toBeInstanceOf(ClaimCatalogError);
      expect((error as ClaimCatalogError).path).toBe('inequality.bad.lhs');
      expect((error as ClaimCatalogError).message).toContain("Invalid claim 'inequality.bad'");
    }
  });
});

describe('loadClaimCatalog', () => {
  it('should load the bundled sample catalog', async () => {
    const catalog = await loadClaimCatalog(SAMPLE_CATALOG);

    expect([...catalog.keys()]).toEqual([
      'quartic_tail',
      'lattice_sum',
      'harmonic_block',
      'mixed_growth',
      'am_gm_three',
      'am_gm_two',
      'square_over_linear',
    ]);
    const lattice = catalog.get('lattice_sum');
    expect(lattice?.kind).toBe('series');
    if (lattice?.kind === 'series') {
      expect(lattice.otherVariables).toEqual(['h', 'm']);
      expect(lattice.conditions).toBe('h > 1 && m > 1');
    }
  });

  it('should fail for a missing file', async () => {
    await expect(loadClaimCatalog('/nonexistent/claims.toml')).rejects.toThrow(
      /Failed to read claim catalog/
    );
  });
});
