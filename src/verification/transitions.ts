/**
 * Controller state machine.
 *
 * @packageDocumentation
 */

import { ControllerTransitionError, type ControllerState } from './types.js';

/**
 * Valid transitions. The edges back to `ProposalRequested` are retries;
 * a run enters `Unknown` directly from a failed attempt once the retry
 * budget is spent.
 */
export const CONTROLLER_TRANSITIONS: ReadonlyMap<ControllerState, readonly ControllerState[]> = new Map([
  ['ProposalRequested', ['PartitionValidated', 'ProposalRequested', 'Unknown']],
  ['PartitionValidated', ['QueriesBuilt']],
  ['QueriesBuilt', ['OracleEvaluating']],
  ['OracleEvaluating', ['Aggregated']],
  ['Aggregated', ['Proved', 'Disproved', 'ProposalRequested', 'Unknown']],
  ['Proved', []],
  ['Disproved', []],
  ['Unknown', []],
]);

/** States with no outgoing transitions. */
export const TERMINAL_STATES: ReadonlySet<ControllerState> = new Set(['Proved', 'Disproved', 'Unknown']);

/**
 * Whether `to` is reachable from `from` in one step.
 */
export function canTransition(from: ControllerState, to: ControllerState): boolean {
  return CONTROLLER_TRANSITIONS.get(from)?.includes(to) ?? false;
}

/**
 * Records the states a run passes through and rejects invalid steps.
 */
export class StateTrail {
  private readonly trail: ControllerState[] = ['ProposalRequested'];

  get current(): ControllerState {
    return this.trail[this.trail.length - 1] ?? 'ProposalRequested';
  }

  get states(): readonly ControllerState[] {
    return this.trail;
  }

  /**
   * @throws ControllerTransitionError if the step is not in {@link CONTROLLER_TRANSITIONS}.
   */
  enter(next: ControllerState): void {
    const from = this.current;
    if (!canTransition(from, next)) {
      throw new ControllerTransitionError(from, next);
    }
    this.trail.push(next);
  }
}
