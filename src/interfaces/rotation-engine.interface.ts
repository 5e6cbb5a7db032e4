import type { PhaseOutcome } from './phase-outcome.interface.js';

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program to completion. Rejects only when the program
 * could not be started at all (for example ENOENT).
 */
export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

export interface RotationEngine {
  rotate(): Promise<PhaseOutcome>;
}
