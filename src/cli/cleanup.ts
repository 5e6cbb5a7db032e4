#!/usr/bin/env node

import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { ConfigLoaderService, type ConfigLoader } from '../services/config-loader.service.js';
import { RetentionCleanupService } from '../services/retention-cleanup.service.js';
import { isEntryPoint } from '../utils/entry-point.js';
import { describeError } from '../utils/errors.js';
import { setLogLevel, writeError, writeRunOutcome } from '../utils/logging.js';
import { isSuccess, toRunOutcome } from '../utils/outcome.js';

export const CLEANUP_USAGE = `
Log Maintenance - Retention Cleanup

Description:
  ${TEXT.CLEANUP_HELP_TEXT}

Usage:
  log-maintenance-cleanup [--dry-run]

Options:
  --dry-run     Report what would be removed without touching any file
  -h, --help    Show this help message

Exit Codes:
  0    Nothing to clean, or every eligible artifact was handled
  1    At least one artifact could not be removed
  2    Configuration is invalid
`;

/**
 * Runs the retention cleanup pass on its own and resolves with its exit code.
 */
export async function runCleanupCommand(
  args: readonly string[],
  loader: ConfigLoader = new ConfigLoaderService(),
  clock?: () => Date
): Promise<number> {
  if (args.includes(CONFIG.CLI_ARG_HELP_LONG) || args.includes(CONFIG.CLI_ARG_HELP_SHORT)) {
    console.log(CLEANUP_USAGE);
    return CONFIG.EXIT_CODE_SUCCESS;
  }

  let service: RetentionCleanupService;
  try {
    const config = await loader.loadConfig();
    setLogLevel(config.logLevel);
    const dryRun = config.retention.dryRun || args.includes(CONFIG.CLI_ARG_DRY_RUN);
    service = new RetentionCleanupService(
      { ...config, retention: { ...config.retention, dryRun } },
      clock
    );
  } catch (error) {
    writeError(TEXT.ERROR_INVALID_CONFIG, {
      code: CONFIG.ERROR_CODE_INVALID_CONFIG,
      error: describeError(error)
    });
    return CONFIG.EXIT_CODE_INVALID_CONFIG;
  }

  const { outcome, report } = await service.cleanup();
  const record = toRunOutcome(CONFIG.PHASE_CLEANUP, outcome);

  if (isSuccess(outcome)) {
    writeRunOutcome(record, TEXT.CLEANUP_SUCCEEDED, {
      removed: report.removed.length,
      archived: report.archived.length,
      kept: report.kept,
      dryRun: report.dryRun
    });
  } else {
    writeRunOutcome(record, TEXT.CLEANUP_FAILED, {
      errorKind: outcome.errorKind,
      reason: outcome.reason,
      failed: report.failed.length
    });
  }

  return record.status;
}

if (isEntryPoint(import.meta.url)) {
  runCleanupCommand(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      writeError(TEXT.CLEANUP_FAILED, {
        phase: CONFIG.PHASE_CLEANUP,
        code: CONFIG.ERROR_CODE_EXECUTION_FAILED,
        error: describeError(error)
      });
      process.exitCode = CONFIG.EXIT_CODE_ERROR;
    });
}
