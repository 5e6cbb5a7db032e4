import { CONFIG } from '../constants/config-constants.js';
import type {
  Phase,
  PhaseErrorKind,
  PhaseFailure,
  PhaseOutcome,
  PhaseSuccess,
  RunOutcome
} from '../interfaces/phase-outcome.interface.js';

export function succeeded(): PhaseSuccess {
  return { kind: 'success' };
}

export function failed(code: number, errorKind: PhaseErrorKind, reason: string): PhaseFailure {
  // A failure must never read as success to the scheduler
  const status = code === CONFIG.EXIT_CODE_SUCCESS ? CONFIG.EXIT_CODE_ERROR : code;
  return { kind: 'failure', code: status, errorKind, reason };
}

export function isSuccess(outcome: PhaseOutcome): outcome is PhaseSuccess {
  return outcome.kind === 'success';
}

export function statusOf(outcome: PhaseOutcome): number {
  return isSuccess(outcome) ? CONFIG.EXIT_CODE_SUCCESS : outcome.code;
}

export function toRunOutcome(phase: Phase, outcome: PhaseOutcome, now: Date = new Date()): RunOutcome {
  return {
    phase,
    status: statusOf(outcome),
    timestamp: now.toISOString()
  };
}
