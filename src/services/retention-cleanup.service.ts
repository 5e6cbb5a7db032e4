import { promises as fs } from 'fs';
import * as path from 'path';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import type {
  CleanupAction,
  CleanupReport,
  CleanupResult,
  LogArtifact,
  RetentionCleanup
} from '../interfaces/cleanup.interface.js';
import {
  type FrozenMaintenanceConfig,
  getRetentionDays,
  hasConfiguredRetention
} from '../schemas/config.schema.js';
import { describeError, hasErrorCode } from '../utils/errors.js';
import { writeDebug, writeError, writeInfo } from '../utils/logging.js';
import { failed, succeeded } from '../utils/outcome.js';

export type RetentionCleanupSettings = Pick<
  FrozenMaintenanceConfig,
  'logDir' | 'archiveDir' | 'environment' | 'retention'
>;

export type PlannedRemoval = {
  artifact: LogArtifact;
  action: CleanupAction;
  cause: 'age' | 'size';
};

/**
 * Parse a rotated artifact name. Live files (`app_production.log`) and
 * anything else that is not a rotation product return null.
 */
export function parseRotatedArtifactName(name: string): { logType: string } | null {
  const match = CONFIG.ROTATED_ARTIFACT_PATTERN.exec(name);
  const logType = match?.[1];
  return logType ? { logType } : null;
}

export class RetentionCleanupService implements RetentionCleanup {
  private readonly phase = CONFIG.PHASE_CLEANUP;

  constructor(
    private readonly settings: RetentionCleanupSettings,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async cleanup(): Promise<CleanupResult> {
    const report: CleanupReport = {
      removed: [],
      archived: [],
      kept: 0,
      failed: [],
      dryRun: this.settings.retention.dryRun
    };

    const artifacts = await this.scan();
    if (artifacts === null) {
      writeInfo(TEXT.CLEANUP_LOG_DIR_MISSING, { phase: this.phase, logDir: this.settings.logDir });
      return { outcome: succeeded(), report };
    }

    const plan = this.plan(artifacts);
    report.kept = artifacts.length - plan.length;

    if (plan.length === 0) {
      writeInfo(TEXT.CLEANUP_NOTHING_TO_DO, { phase: this.phase, scanned: artifacts.length });
      return { outcome: succeeded(), report };
    }

    for (const item of plan) {
      await this.apply(item, report);
    }

    if (report.failed.length > 0) {
      return {
        outcome: failed(
          CONFIG.EXIT_CODE_ERROR,
          'partial_cleanup',
          `${TEXT.ERROR_CLEANUP_PARTIAL}: ${report.failed.length} of ${plan.length}`
        ),
        report
      };
    }

    return { outcome: succeeded(), report };
  }

  /**
   * Rotated artifacts currently in the log directory, or null when the
   * directory does not exist.
   */
  async scan(): Promise<LogArtifact[] | null> {
    let entries: string[];
    try {
      const dirents = await fs.readdir(this.settings.logDir, { withFileTypes: true });
      entries = dirents.filter(entry => entry.isFile()).map(entry => entry.name);
    } catch (error) {
      if (hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
        return null;
      }
      throw error;
    }

    const now = this.clock().getTime();
    const artifacts: LogArtifact[] = [];

    for (const name of entries) {
      const parsed = parseRotatedArtifactName(name);
      if (!parsed) {
        continue;
      }

      const filePath = path.join(this.settings.logDir, name);
      try {
        const stats = await fs.stat(filePath);
        artifacts.push({
          name,
          path: filePath,
          logType: parsed.logType,
          sizeBytes: stats.size,
          modifiedAt: stats.mtime,
          ageMs: now - stats.mtime.getTime()
        });
      } catch (error) {
        // Gone between readdir and stat, e.g. compressed by a concurrent rotation
        if (!hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
          throw error;
        }
      }
    }

    return artifacts;
  }

  plan(artifacts: readonly LogArtifact[]): PlannedRemoval[] {
    const action: CleanupAction = this.settings.archiveDir ? 'archive' : 'remove';
    const planned: PlannedRemoval[] = [];
    const retainedByType = new Map<string, LogArtifact[]>();

    for (const artifact of artifacts) {
      const retentionDays = getRetentionDays(this.settings, artifact.logType);
      if (!hasConfiguredRetention(this.settings, artifact.logType)) {
        writeDebug(`${TEXT.CLEANUP_DEFAULT_RETENTION} for "${artifact.logType}"`, {
          phase: this.phase,
          artifact: artifact.name,
          retentionDays
        });
      }

      if (artifact.ageMs > retentionDays * CONFIG.MS_PER_DAY) {
        planned.push({ artifact, action, cause: 'age' });
        continue;
      }

      const retained = retainedByType.get(artifact.logType) ?? [];
      retained.push(artifact);
      retainedByType.set(artifact.logType, retained);
    }

    const maxTotalSizeMb = this.settings.retention.maxTotalSizeMb;
    if (maxTotalSizeMb !== undefined) {
      const capBytes = maxTotalSizeMb * CONFIG.BYTES_PER_MB;
      for (const retained of retainedByType.values()) {
        planned.push(...this.planSizeCap(retained, capBytes, action));
      }
    }

    return planned;
  }

  // Keeps the newest artifacts that fit under the cap
  private planSizeCap(retained: LogArtifact[], capBytes: number, action: CleanupAction): PlannedRemoval[] {
    const newestFirst = [...retained].sort((a, b) => a.ageMs - b.ageMs);
    const removals: PlannedRemoval[] = [];
    let totalBytes = 0;

    for (const artifact of newestFirst) {
      totalBytes += artifact.sizeBytes;
      if (totalBytes > capBytes) {
        removals.push({ artifact, action, cause: 'size' });
      }
    }

    return removals;
  }

  private async apply(item: PlannedRemoval, report: CleanupReport): Promise<void> {
    const { artifact, action, cause } = item;
    const context = {
      phase: this.phase,
      artifact: artifact.name,
      logType: artifact.logType,
      cause,
      ageDays: Math.floor(artifact.ageMs / CONFIG.MS_PER_DAY),
      sizeBytes: artifact.sizeBytes
    };

    if (this.settings.retention.dryRun) {
      writeInfo(action === 'archive' ? TEXT.CLEANUP_WOULD_ARCHIVE : TEXT.CLEANUP_WOULD_REMOVE, context);
      return;
    }

    const archiveDir = this.settings.archiveDir;
    try {
      if (action === 'archive' && archiveDir) {
        await this.archive(artifact, archiveDir);
        report.archived.push(artifact.name);
        writeInfo(TEXT.CLEANUP_ARCHIVED, context);
      } else {
        await fs.unlink(artifact.path);
        report.removed.push(artifact.name);
        writeInfo(TEXT.CLEANUP_REMOVED, context);
      }
    } catch (error) {
      // Already gone, nothing left to remove
      if (hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
        return;
      }
      const message = describeError(error);
      report.failed.push({ name: artifact.name, error: message });
      writeError(TEXT.CLEANUP_REMOVE_FAILED, { ...context, error: message });
    }
  }

  private async archive(artifact: LogArtifact, archiveDir: string): Promise<void> {
    await fs.mkdir(archiveDir, { recursive: true });
    const target = path.join(archiveDir, artifact.name);

    try {
      await fs.rename(artifact.path, target);
    } catch (error) {
      if (!hasErrorCode(error, CONFIG.FS_ERROR_EXDEV)) {
        throw error;
      }
      // Archive on another filesystem
      await fs.copyFile(artifact.path, target);
      await fs.unlink(artifact.path);
    }
  }
}
