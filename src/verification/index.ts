/**
 * Verification controller and run transcript.
 *
 * @packageDocumentation
 */

export type {
  ControllerState,
  VerificationErrorKind,
  ProofVerdict,
  TranscriptEvent,
  TranscriptEntry,
  VerificationRun,
  AttemptRanges,
  VerificationSettings,
} from './types.js';
export { DEFAULT_VERIFICATION_SETTINGS, ControllerTransitionError } from './types.js';
export { CONTROLLER_TRANSITIONS, TERMINAL_STATES, canTransition, StateTrail } from './transitions.js';
export { Transcript, formatTranscript, formatTranscriptEntry, verdictLabel } from './transcript.js';
export {
  VerificationController,
  describeVerdict,
  type VerificationControllerOptions,
} from './controller.js';
