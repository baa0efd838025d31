import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { createInequalityClaim, createSeriesClaim } from '../claims/index.js';
import {
  MalformedPartitionError,
  defaultPartition,
  partitionElements,
  validateInequalityPartition,
  validatePartition,
  validateSeriesPartition,
} from './index.js';

const seriesClaim = createSeriesClaim({
  formula: '(2*d+1)/(h^2 + d^2*m)',
  summationIndex: 'd',
  otherVariables: ['h', 'm'],
  summationBounds: ['0', 'Infinity'],
  conditions: 'h > 1 && m > 1',
  conjecturedUpperBound: '1 + Log[m^2]',
});

const inequalityClaim = createInequalityClaim({
  variables: ['x', 'y'],
  domain: ['x > 0', 'y > 1'],
  lhs: 'x*y',
  rhs: 'y*Log[y] + Exp[x]',
});

function codeOf(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof MalformedPartitionError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('validateSeriesPartition', () => {
  it('should insert missing endpoints', () => {
    expect(validateSeriesPartition(seriesClaim, '[h, h*m]').breakpoints).toEqual([
      '0',
      'h',
      'h*m',
      'Infinity',
    ]);
  });

  it('should keep endpoints that are already present', () => {
    expect(validateSeriesPartition(seriesClaim, '[0, h, Infinity]').breakpoints).toEqual([
      '0',
      'h',
      'Infinity',
    ]);
  });

  it('should compare endpoints ignoring spelling of infinity', () => {
    expect(validateSeriesPartition(seriesClaim, '[0, h, infinity]').breakpoints).toEqual([
      '0',
      'h',
      'Infinity',
    ]);
  });

  it('should use the whole range for an empty list', () => {
    expect(validateSeriesPartition(seriesClaim, '[]').breakpoints).toEqual(['0', 'Infinity']);
  });

  it('should accept a pre-split list', () => {
    expect(validateSeriesPartition(seriesClaim, ['h']).breakpoints).toEqual(['0', 'h', 'Infinity']);
  });

  it('should reject the summation index in a breakpoint', () => {
    expect(codeOf(() => validateSeriesPartition(seriesClaim, '[0, d, Infinity]'))).toBe('FOREIGN_SYMBOL');
  });

  it('should reject non-ASCII text left after normalisation', () => {
    expect(codeOf(() => validateSeriesPartition(seriesClaim, '[0, √h]'))).toBe('NON_ASCII');
  });

  it('should not check ordering between breakpoints', () => {
    expect(validateSeriesPartition(seriesClaim, '[h*m, h]').breakpoints).toEqual([
      '0',
      'h*m',
      'h',
      'Infinity',
    ]);
  });

  it('should start at the lower bound, end at the upper bound and be a fixed point', () => {
    const breakpoint = fc.constantFrom('0', 'h', 'm', 'h*m', 'Sqrt[h]', '2', 'Infinity');
    fc.assert(
      fc.property(fc.array(breakpoint, { maxLength: 6 }), (points) => {
        const validated = validateSeriesPartition(seriesClaim, points);
        expect(validated.breakpoints[0]).toBe('0');
        expect(validated.breakpoints[validated.breakpoints.length - 1]).toBe('Infinity');
        expect(validateSeriesPartition(seriesClaim, partitionElements(validated))).toEqual(validated);
      })
    );
  });
});

describe('validateInequalityPartition', () => {
  it('should conjoin the base domain in front of each subdomain', () => {
    const partition = validateInequalityPartition(
      inequalityClaim,
      '[x < 1, x >= 1 && y < x, x>=1 && y>=x]'
    );

    expect(partition.baseDomain).toEqual(['x > 0', 'y > 1']);
    expect(partition.subdomains.map((s) => s.predicate)).toEqual([
      'x > 0 && y > 1 && x < 1',
      'x > 0 && y > 1 && x >= 1 && y < x',
      'x > 0 && y > 1 && x>=1 && y>=x',
    ]);
  });

  it('should strip an echoed copy of the base domain', () => {
    const partition = validateInequalityPartition(
      inequalityClaim,
      '[{x>0, y>1, x < 1}, x > 0 && y > 1 && x >= 1]'
    );

    expect(partition.subdomains.map((s) => s.conjuncts)).toEqual([
      ['x > 0', 'y > 1', 'x < 1'],
      ['x > 0', 'y > 1', 'x >= 1'],
    ]);
  });

  it('should de-duplicate conjuncts in first-seen order', () => {
    const partition = validateInequalityPartition(inequalityClaim, '[x < 1 && x<1 && y < 2]');
    expect(partition.subdomains[0]?.conjuncts).toEqual(['x > 0', 'y > 1', 'x < 1', 'y < 2']);
  });

  it('should parenthesise disjunctions', () => {
    const partition = validateInequalityPartition(inequalityClaim, '[x < 1 || y < 2]');
    expect(partition.subdomains[0]?.predicate).toBe('x > 0 && y > 1 && (x < 1 || y < 2)');
  });

  it('should read True as the base domain', () => {
    const partition = validateInequalityPartition(inequalityClaim, '[True]');
    expect(partition.subdomains).toEqual([{ conjuncts: ['x > 0', 'y > 1'], predicate: 'x > 0 && y > 1' }]);
  });

  it('should reject an empty list', () => {
    expect(codeOf(() => validateInequalityPartition(inequalityClaim, '[]'))).toBe('EMPTY_LIST');
  });

  it('should reject undeclared symbols', () => {
    expect(codeOf(() => validateInequalityPartition(inequalityClaim, '[z > 1]'))).toBe('FOREIGN_SYMBOL');
  });

  it('should be a fixed point when re-validated', () => {
    const restriction = fc.constantFrom('x < 1', 'x >= 1', 'y < x', 'y >= x', 'x > 0', 'x*y < 4');
    const subdomain = fc
      .array(restriction, { minLength: 1, maxLength: 3 })
      .map((parts) => parts.join(' && '));
    fc.assert(
      fc.property(fc.array(subdomain, { minLength: 1, maxLength: 4 }), (subdomains) => {
        const validated = validateInequalityPartition(inequalityClaim, subdomains);
        for (const piece of validated.subdomains) {
          expect(piece.conjuncts.slice(0, 2)).toEqual(['x > 0', 'y > 1']);
        }
        expect(validateInequalityPartition(inequalityClaim, partitionElements(validated))).toEqual(validated);
      })
    );
  });
});

describe('validatePartition', () => {
  it('should dispatch on the claim kind', () => {
    expect(validatePartition(seriesClaim, '[h]').kind).toBe('series');
    expect(validatePartition(inequalityClaim, '[x < 1]').kind).toBe('inequality');
  });
});

describe('defaultPartition', () => {
  it('should span the whole summation range', () => {
    expect(defaultPartition(seriesClaim)).toEqual({ kind: 'series', breakpoints: ['0', 'Infinity'] });
  });

  it('should use the base domain as the only subdomain', () => {
    expect(defaultPartition(inequalityClaim).subdomains).toEqual([
      { conjuncts: ['x > 0', 'y > 1'], predicate: 'x > 0 && y > 1' },
    ]);
  });

  it('should render an unconstrained domain as True', () => {
    const claim = createInequalityClaim({ variables: ['x'], lhs: 'x', rhs: 'x' });
    expect(defaultPartition(claim).subdomains[0]?.predicate).toBe('True');
  });
});
