import { describe, it, expect } from 'vitest';
import { createInequalityClaim } from '../claims/index.js';
import type { ForallQuery } from '../query/index.js';
import { OracleTransportError, StubProposalOracle, StubResolutionOracle } from './index.js';

const claim = createInequalityClaim({ variables: ['x'], lhs: 'x', rhs: 'x' });
const query: ForallQuery = { variables: ['x'], domain: 'True', comparison: '(x) <= 10^(0)*(x)', exponent: 0 };

describe('StubResolutionOracle', () => {
  it('should answer with a fixed verdict and record calls', async () => {
    const oracle = new StubResolutionOracle({ forall: 'true' });

    await expect(oracle.resolveForall(query)).resolves.toBe('true');
    expect(oracle.forallCalls).toEqual([query]);
  });

  it('should pass the call number to a responder', async () => {
    const oracle = new StubResolutionOracle({ forall: (_q, call) => (call === 0 ? 'unknown' : 'false') });

    await expect(oracle.resolveForall(query)).resolves.toBe('unknown');
    await expect(oracle.resolveForall(query)).resolves.toBe('false');
  });

  it('should fail evaluate without a responder', async () => {
    const oracle = new StubResolutionOracle();

    await expect(oracle.evaluate('1')).rejects.toThrow(OracleTransportError);
    expect(oracle.evaluateCalls).toEqual(['1']);
  });
});

describe('StubProposalOracle', () => {
  it('should repeat the last canned response', async () => {
    const oracle = new StubProposalOracle(['first', 'second']);

    const replies = [
      await oracle.proposePartition(claim),
      await oracle.proposePartition(claim),
      await oracle.proposePartition(claim),
    ];
    expect(replies).toEqual(['first', 'second', 'second']);
    expect(oracle.calls).toHaveLength(3);
  });
});
