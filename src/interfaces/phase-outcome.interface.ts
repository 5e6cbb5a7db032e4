import type { CONFIG } from '../constants/config-constants.js';

export type Phase = typeof CONFIG.PHASE_ROTATION | typeof CONFIG.PHASE_CLEANUP;

export type PhaseErrorKind =
  | 'state_store'
  | 'missing_dependency'
  | 'signal'
  | 'exit_status'
  | 'partial_cleanup'
  | 'unexpected';

export interface PhaseSuccess {
  kind: 'success';
}

export interface PhaseFailure {
  kind: 'failure';
  code: number;
  errorKind: PhaseErrorKind;
  reason: string;
}

export type PhaseOutcome = PhaseSuccess | PhaseFailure;

/**
 * One line of the run narrative. Produced once per executed phase and
 * written to the log stream only.
 */
export interface RunOutcome {
  phase: Phase;
  status: number;
  timestamp: string;
}
