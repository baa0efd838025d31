import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  canonicalKey,
  dedupePreservingOrder,
  findMatchingClose,
  hasBalancedDelimiters,
  isAscii,
  normalizeBoundExpression,
  normalizeExpression,
  parenthesizeDisjunction,
  renderConjunction,
  renderList,
  splitConjuncts,
  splitTopLevel,
  unwrapBraces,
} from './normalize.js';
import { foreignSymbols, freeSymbols } from './symbols.js';

const atom = fc.stringMatching(/^[a-z][a-z0-9]{0,5}$/);

describe('normalizeExpression', () => {
  it('should rewrite lower-case heads and typographic operators', () => {
    expect(normalizeExpression('x ≤ exp[y]')).toBe('x <= Exp[y]');
    expect(normalizeExpression('log[x] × sqrt[y]')).toBe('Log[x] * Sqrt[y]');
    expect(normalizeExpression('ln[x] − 1 ≥ 0')).toBe('Log[x] - 1 >= 0');
  });

  it('should join a capitalised head to its bracket', () => {
    expect(normalizeExpression('Log [x] > 1 && Sqrt  [y] < 2')).toBe('Log[x] > 1 && Sqrt[y] < 2');
    expect(freeSymbols(normalizeExpression('Log [x] > 1'))).toEqual(['x']);
  });

  it('should map the infinity sign to Infinity', () => {
    expect(normalizeExpression('∞')).toBe('Infinity');
  });

  it('should leave canonical heads alone', () => {
    expect(normalizeExpression('Exp[x] + myexp[y]')).toBe('Exp[x] + myexp[y]');
  });

  it('should collapse whitespace', () => {
    expect(normalizeExpression('  a   +\n b ')).toBe('a + b');
  });
});

describe('canonicalKey', () => {
  it('should ignore whitespace', () => {
    expect(canonicalKey('x > 0')).toBe(canonicalKey('x>0'));
  });
});

describe('isAscii', () => {
  it('should reject non-ASCII characters', () => {
    expect(isAscii('x <= y')).toBe(true);
    expect(isAscii('x ≤ y')).toBe(false);
  });

  it('should accept multi-line text with tabs', () => {
    expect(isAscii('a = 1;\n\tb = 2;\r\n')).toBe(true);
    expect(isAscii('a = 1;\n∞')).toBe(false);
  });
});

describe('hasBalancedDelimiters', () => {
  it('should accept nested groups', () => {
    expect(hasBalancedDelimiters('Log[(x+1)^2] + {a, b}')).toBe(true);
  });

  it('should reject mismatched or unclosed groups', () => {
    expect(hasBalancedDelimiters('[(])')).toBe(false);
    expect(hasBalancedDelimiters('((x)')).toBe(false);
    expect(hasBalancedDelimiters('x)')).toBe(false);
  });
});

describe('findMatchingClose', () => {
  it('should find the closer of the outermost group', () => {
    expect(findMatchingClose('{a, [b]} c', 0)).toBe(7);
  });

  it('should return -1 for an unclosed group', () => {
    expect(findMatchingClose('[a, (b]', 0)).toBe(-1);
  });
});

describe('splitTopLevel', () => {
  it('should not split inside groups', () => {
    expect(splitTopLevel('a, f[b, c], {d, e}', ',')).toEqual(['a', 'f[b, c]', '{d, e}']);
  });

  it('should keep empty pieces', () => {
    expect(splitTopLevel('a,,b', ',')).toEqual(['a', '', 'b']);
  });

  it('should recover the atoms of a comma-joined list', () => {
    fc.assert(
      fc.property(fc.array(atom, { minLength: 1, maxLength: 8 }), (atoms) => {
        expect(splitTopLevel(atoms.join(', '), ',')).toEqual(atoms);
      })
    );
  });
});

describe('unwrapBraces', () => {
  it('should unwrap a single brace group', () => {
    expect(unwrapBraces('{x>0, y>1}')).toBe('x>0, y>1');
  });

  it('should not unwrap a group followed by more text', () => {
    expect(unwrapBraces('{x>0} && {y>1}')).toBeUndefined();
  });
});

describe('splitConjuncts', () => {
  it('should expand an echoed brace list', () => {
    expect(splitConjuncts('{x>0, y>1} && x<1')).toEqual(['x>0', 'y>1', 'x<1']);
  });

  it('should drop True', () => {
    expect(splitConjuncts('True')).toEqual([]);
    expect(splitConjuncts('x > 0 && True')).toEqual(['x > 0']);
  });

  it('should keep conjunctions nested in function heads', () => {
    expect(splitConjuncts('Implies[a && b, c] && d')).toEqual(['Implies[a && b, c]', 'd']);
  });
});

describe('dedupePreservingOrder', () => {
  it('should keep the first spelling of each conjunct', () => {
    expect(dedupePreservingOrder(['x>0', 'x > 0', 'y<1', 'x>0'])).toEqual(['x>0', 'y<1']);
  });

  it('should be idempotent', () => {
    fc.assert(
      fc.property(fc.array(atom), (items) => {
        const once = dedupePreservingOrder(items);
        expect(dedupePreservingOrder(once)).toEqual(once);
      })
    );
  });
});

describe('renderConjunction / renderList', () => {
  it('should render an empty conjunction as True', () => {
    expect(renderConjunction([])).toBe('True');
    expect(renderConjunction(['x>0', 'y>1'])).toBe('x>0 && y>1');
  });

  it('should render brace lists', () => {
    expect(renderList(['0', 'h', 'Infinity'])).toBe('{0, h, Infinity}');
  });
});

describe('freeSymbols', () => {
  it('should skip function heads and repeated symbols', () => {
    expect(freeSymbols('y*Log[y] + Exp[x]')).toEqual(['y', 'x']);
  });

  it('should skip numbers and built-in constants', () => {
    expect(freeSymbols('2*d + 10^c + Infinity + Pi')).toEqual(['d', 'c']);
  });

  it('should treat a head separated from its bracket by spaces as a head', () => {
    expect(freeSymbols('Log [x]')).toEqual(['x']);
  });

  it('should report symbols outside the allowed set', () => {
    expect(foreignSymbols('h^2 + d*m', ['h', 'm'])).toEqual(['d']);
  });
});

describe('normalizeBoundExpression', () => {
  it('should spell signed infinities canonically', () => {
    expect(normalizeBoundExpression('infinity')).toBe('Infinity');
    expect(normalizeBoundExpression('+INFINITY')).toBe('Infinity');
    expect(normalizeBoundExpression('- infinity')).toBe('-Infinity');
    expect(normalizeBoundExpression('−∞')).toBe('-Infinity');
    expect(normalizeBoundExpression('h^2')).toBe('h^2');
  });
});

describe('parenthesizeDisjunction', () => {
  it('should wrap only top-level disjunctions', () => {
    expect(parenthesizeDisjunction('x < 1 || y < 2')).toBe('(x < 1 || y < 2)');
    expect(parenthesizeDisjunction('(x < 1 || y < 2)')).toBe('(x < 1 || y < 2)');
    expect(parenthesizeDisjunction('x < 1')).toBe('x < 1');
  });
});
