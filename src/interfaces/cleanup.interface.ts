import type { PhaseOutcome } from './phase-outcome.interface.js';

export interface LogArtifact {
  name: string;
  path: string;
  logType: string;
  sizeBytes: number;
  modifiedAt: Date;
  ageMs: number;
}

export type CleanupAction = 'remove' | 'archive';

export interface CleanupFailureEntry {
  name: string;
  error: string;
}

export interface CleanupReport {
  removed: string[];
  archived: string[];
  kept: number;
  failed: CleanupFailureEntry[];
  dryRun: boolean;
}

export interface CleanupResult {
  outcome: PhaseOutcome;
  report: CleanupReport;
}

export interface RetentionCleanup {
  cleanup(): Promise<CleanupResult>;
}
