import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import type { CleanupReport, RetentionCleanup } from '../interfaces/cleanup.interface.js';
import type { Phase, PhaseOutcome } from '../interfaces/phase-outcome.interface.js';
import type { RotationEngine } from '../interfaces/rotation-engine.interface.js';
import type { StateReader } from '../interfaces/state-store.interface.js';
import { StateStoreError, describeError } from '../utils/errors.js';
import { writeInfo, writeRunOutcome } from '../utils/logging.js';
import { failed, isSuccess, toRunOutcome } from '../utils/outcome.js';

type CleanupSummary = {
  removed: number;
  archived: number;
  kept: number;
  failed: number;
  dryRun: boolean;
};

export interface CoordinatorDependencies {
  stateStore: Pick<StateReader, 'verifyAccess'>;
  rotationEngine: RotationEngine;
  retentionCleanup: RetentionCleanup;
  clock?: () => Date;
}

/**
 * Runs rotation, then cleanup only if rotation succeeded, and returns the
 * exit code of the first failing phase (0 when both succeed).
 *
 * No retries: the next scheduled invocation is the retry. Idempotent as long
 * as the rotation utility honours its state and cleanup only filters by age.
 */
export class MaintenanceCoordinator {
  private readonly clock: () => Date;

  constructor(private readonly deps: CoordinatorDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(): Promise<number> {
    writeInfo(TEXT.RUN_STARTED);

    const rotation = await this.runRotation();
    const rotationRecord = toRunOutcome(CONFIG.PHASE_ROTATION, rotation, this.clock());

    if (!isSuccess(rotation)) {
      // Cleanup must not run: unrotated logs could otherwise be deleted
      writeRunOutcome(rotationRecord, TEXT.ROTATION_FAILED, {
        errorKind: rotation.errorKind,
        reason: rotation.reason,
        cleanup: 'skipped'
      });
      writeInfo(TEXT.CLEANUP_SKIPPED, { phase: CONFIG.PHASE_CLEANUP });
      return this.finish(rotationRecord.status);
    }
    writeRunOutcome(rotationRecord, TEXT.ROTATION_SUCCEEDED);

    const { outcome: cleanup, report } = await this.runCleanup();
    const cleanupRecord = toRunOutcome(CONFIG.PHASE_CLEANUP, cleanup, this.clock());
    const summary = report ? this.summarize(report) : {};

    if (!isSuccess(cleanup)) {
      writeRunOutcome(cleanupRecord, TEXT.CLEANUP_FAILED, {
        errorKind: cleanup.errorKind,
        reason: cleanup.reason,
        ...summary
      });
    } else {
      writeRunOutcome(cleanupRecord, TEXT.CLEANUP_SUCCEEDED, summary);
    }

    return this.finish(cleanupRecord.status);
  }

  private async runRotation(): Promise<PhaseOutcome> {
    writeInfo(TEXT.ROTATION_STARTED, { phase: CONFIG.PHASE_ROTATION });
    try {
      // Location check only; the state content belongs to the rotation utility
      await this.deps.stateStore.verifyAccess();
      return await this.deps.rotationEngine.rotate();
    } catch (error) {
      return this.toFailure(CONFIG.PHASE_ROTATION, error);
    }
  }

  private async runCleanup(): Promise<{ outcome: PhaseOutcome; report?: CleanupReport }> {
    writeInfo(TEXT.CLEANUP_STARTED, { phase: CONFIG.PHASE_CLEANUP });
    try {
      return await this.deps.retentionCleanup.cleanup();
    } catch (error) {
      return { outcome: this.toFailure(CONFIG.PHASE_CLEANUP, error) };
    }
  }

  /**
   * Anything a phase throws becomes a failure of that phase.
   */
  private toFailure(phase: Phase, error: unknown): PhaseOutcome {
    if (error instanceof StateStoreError) {
      return failed(CONFIG.EXIT_CODE_ERROR, 'state_store', error.message);
    }
    return failed(CONFIG.EXIT_CODE_ERROR, 'unexpected', `${phase}: ${describeError(error)}`);
  }

  private summarize(report: CleanupReport): CleanupSummary {
    return {
      removed: report.removed.length,
      archived: report.archived.length,
      kept: report.kept,
      failed: report.failed.length,
      dryRun: report.dryRun
    };
  }

  private finish(exitCode: number): number {
    writeInfo(TEXT.RUN_FINISHED, { exitCode });
    return exitCode;
  }
}
