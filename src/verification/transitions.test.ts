import { describe, it, expect } from 'vitest';
import { CONTROLLER_TRANSITIONS, StateTrail, TERMINAL_STATES, canTransition } from './transitions.js';
import { ControllerTransitionError } from './types.js';

describe('canTransition', () => {
  it('should follow the forward pipeline', () => {
    expect(canTransition('ProposalRequested', 'PartitionValidated')).toBe(true);
    expect(canTransition('PartitionValidated', 'QueriesBuilt')).toBe(true);
    expect(canTransition('QueriesBuilt', 'OracleEvaluating')).toBe(true);
    expect(canTransition('OracleEvaluating', 'Aggregated')).toBe(true);
    expect(canTransition('Aggregated', 'Proved')).toBe(true);
    expect(canTransition('Aggregated', 'Disproved')).toBe(true);
  });

  it('should allow retries back to ProposalRequested', () => {
    expect(canTransition('ProposalRequested', 'ProposalRequested')).toBe(true);
    expect(canTransition('Aggregated', 'ProposalRequested')).toBe(true);
  });

  it('should reject skipped steps and exits from terminal states', () => {
    expect(canTransition('ProposalRequested', 'OracleEvaluating')).toBe(false);
    expect(canTransition('PartitionValidated', 'Proved')).toBe(false);
    expect(canTransition('Disproved', 'ProposalRequested')).toBe(false);
  });

  it('should give terminal states no outgoing edges', () => {
    for (const state of TERMINAL_STATES) {
      expect(CONTROLLER_TRANSITIONS.get(state)).toEqual([]);
    }
  });

  it('should never reach Disproved except from Aggregated', () => {
    const sources = [...CONTROLLER_TRANSITIONS.entries()]
      .filter(([, targets]) => targets.includes('Disproved'))
      .map(([source]) => source);
    expect(sources).toEqual(['Aggregated']);
  });
});

describe('StateTrail', () => {
  it('should start in ProposalRequested and record each step', () => {
    const trail = new StateTrail();
    trail.enter('PartitionValidated');
    trail.enter('QueriesBuilt');

    expect(trail.current).toBe('QueriesBuilt');
    expect(trail.states).toEqual(['ProposalRequested', 'PartitionValidated', 'QueriesBuilt']);
  });

  it('should throw on an invalid step', () => {
    const trail = new StateTrail();
    expect(() => trail.enter('Proved')).toThrow(ControllerTransitionError);
    expect(() => trail.enter('Proved')).toThrow('Invalid controller transition ProposalRequested -> Proved');
  });
});
