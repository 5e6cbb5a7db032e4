#!/usr/bin/env node

import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigLoaderService, resolveConfigPath } from '../services/config-loader.service.js';
import { FileRotationStateStore } from '../services/file-state-store.service.js';
import { type FrozenMaintenanceConfig, getRetentionDays } from '../schemas/config.schema.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { isEntryPoint } from '../utils/entry-point.js';
import { describeError, hasErrorCode } from '../utils/errors.js';

// ANSI color codes for terminal output
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m'
};

type DiagnosticStatus = typeof CONFIG.CLI_STATUS_OK | typeof CONFIG.CLI_STATUS_WARN | typeof CONFIG.CLI_STATUS_ERROR;

export interface DiagnosticResult {
  check: string;
  status: DiagnosticStatus;
  message: string;
  details?: string[];
}

interface DiagnosticSummary {
  total: number;
  passed: number;
  warnings: number;
  errors: number;
}

function colorize(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

function printHeader(title: string): void {
  console.log(`\n${colorize('═'.repeat(60), 'blue')}`);
  console.log(colorize(`  ${title}`, 'cyan'));
  console.log(`${colorize('═'.repeat(60), 'blue')}\n`);
}

function printResult(result: DiagnosticResult): void {
  const statusColor = result.status === 'OK' ? 'green' :
                      result.status === 'WARN' ? 'yellow' : 'red';
  const statusIcon = result.status === 'OK' ? '✅' :
                     result.status === 'WARN' ? '⚠️ ' : '❌';

  console.log(`${statusIcon} ${colorize(result.status, statusColor)} - ${result.check}`);
  console.log(`  ${colorize(result.message, 'gray')}`);

  if (result.details && result.details.length > 0) {
    result.details.forEach(detail => {
      console.log(`    • ${colorize(detail, 'gray')}`);
    });
  }
}

/**
 * Pre-flight checks an operator can run before handing the job to the
 * scheduler. Read-only: never creates the state store or log directory.
 */
export class DoctorCLI {
  private results: DiagnosticResult[] = [];
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath || resolveConfigPath();
  }

  getResults(): readonly DiagnosticResult[] {
    return this.results;
  }

  /** Resolves with the exit code: 2 when any check failed, otherwise 0. */
  async run(): Promise<number> {
    printHeader(TEXT.DOCTOR_HEADER);
    console.log(`Analyzing: ${colorize(this.configPath, 'yellow')}\n`);

    const config = await this.checkConfigSchema();
    if (config) {
      await this.checkStateStore(config);
      await this.checkRotationBinary(config);
      await this.checkRotationRules(config);
      await this.checkLogDirectory(config);
      this.checkRetentionPolicy(config);
    }

    this.printSummary();

    const summary = this.getSummary();
    return summary.errors > 0 ? CONFIG.EXIT_CODE_INVALID_CONFIG : CONFIG.EXIT_CODE_SUCCESS;
  }

  private async checkConfigSchema(): Promise<FrozenMaintenanceConfig | null> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_CONFIG, 'blue'));

    const loader = new ConfigLoaderService(this.configPath);
    try {
      const config = await loader.loadConfig();
      this.results.push({
        check: 'Configuration',
        status: loader.isUsingDefaults() ? 'WARN' : 'OK',
        message: loader.isUsingDefaults() ? TEXT.CONFIG_DEFAULTS : TEXT.DOCTOR_CONFIG_VALID,
        details: [
          `Environment: ${config.environment}`,
          `Log directory: ${config.logDir}`,
          `Rotation rules: ${config.rotation.rulesPath}`,
          `Rotation state: ${config.rotation.statePath}`
        ]
      });
      return config;
    } catch (error) {
      this.results.push({
        check: 'Configuration',
        status: 'ERROR',
        message: TEXT.DOCTOR_CONFIG_INVALID,
        details: [describeError(error)]
      });
      return null;
    }
  }

  private async checkStateStore(config: FrozenMaintenanceConfig): Promise<void> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_STATE, 'blue'));

    const store = new FileRotationStateStore(config.rotation.statePath, {
      ownerUid: config.rotation.stateOwnerUid
    });

    try {
      const access = await store.verifyAccess();
      if (!access.exists) {
        this.results.push({
          check: 'Rotation State',
          status: 'OK',
          message: TEXT.DOCTOR_STATE_ABSENT,
          details: [`Location: ${access.location}`]
        });
        return;
      }

      await store.read();
      this.results.push({
        check: 'Rotation State',
        status: 'OK',
        message: TEXT.DOCTOR_STATE_OK,
        details: [
          `Location: ${access.location}`,
          `Owner uid: ${access.ownerUid}`,
          `Mode: ${access.mode?.toString(8)}`
        ]
      });
    } catch (error) {
      this.results.push({
        check: 'Rotation State',
        status: 'ERROR',
        message: describeError(error),
        details: [`Location: ${store.getLocation()}`]
      });
    }
  }

  private async checkRotationBinary(config: FrozenMaintenanceConfig): Promise<void> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_BINARY, 'blue'));

    try {
      await fs.access(config.rotation.bin, fs.constants.X_OK);
      this.results.push({
        check: 'Rotation Utility',
        status: 'OK',
        message: TEXT.DOCTOR_BINARY_OK,
        details: [config.rotation.bin]
      });
    } catch {
      this.results.push({
        check: 'Rotation Utility',
        status: 'ERROR',
        message: TEXT.DOCTOR_BINARY_MISSING,
        details: [config.rotation.bin]
      });
    }
  }

  private async checkRotationRules(config: FrozenMaintenanceConfig): Promise<void> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_RULES, 'blue'));

    try {
      await fs.access(config.rotation.rulesPath, fs.constants.R_OK);
      this.results.push({
        check: 'Rotation Rules',
        status: 'OK',
        message: TEXT.DOCTOR_RULES_OK,
        details: [config.rotation.rulesPath]
      });
    } catch {
      this.results.push({
        check: 'Rotation Rules',
        status: 'ERROR',
        message: TEXT.DOCTOR_RULES_MISSING,
        details: [config.rotation.rulesPath]
      });
    }
  }

  private async checkLogDirectory(config: FrozenMaintenanceConfig): Promise<void> {
    console.log(colorize(TEXT.DOCTOR_CHECKING_LOG_DIR, 'blue'));

    let names: string[];
    try {
      names = await fs.readdir(config.logDir);
    } catch (error) {
      this.results.push({
        check: 'Log Directory',
        status: hasErrorCode(error, CONFIG.FS_ERROR_ENOENT) ? 'WARN' : 'ERROR',
        message: hasErrorCode(error, CONFIG.FS_ERROR_ENOENT) ? TEXT.DOCTOR_LOG_DIR_MISSING : describeError(error),
        details: [config.logDir]
      });
      return;
    }

    let totalBytes = 0;
    for (const name of names) {
      try {
        const stats = await fs.stat(path.join(config.logDir, name));
        if (stats.isFile()) {
          totalBytes += stats.size;
        }
      } catch {
        // Rotated away while scanning
      }
    }

    const totalMb = totalBytes / CONFIG.BYTES_PER_MB;
    const large = totalMb > CONFIG.DOCTOR_LOG_DIR_SIZE_WARN_MB;
    this.results.push({
      check: 'Log Directory',
      status: large ? 'WARN' : 'OK',
      message: large ? TEXT.DOCTOR_LOG_DIR_LARGE : TEXT.DOCTOR_LOG_DIR_OK,
      details: [`${config.logDir}: ${names.length} entries, ${totalMb.toFixed(1)} MB`]
    });
  }

  private checkRetentionPolicy(config: FrozenMaintenanceConfig): void {
    console.log(colorize(TEXT.DOCTOR_CHECKING_RETENTION, 'blue'));

    const details: string[] = [];
    const warnings: string[] = [];
    for (const logType of Object.keys(config.retention.days).sort()) {
      const days = getRetentionDays(config, logType);
      details.push(`${logType}: ${days} days (${config.environment})`);
      if (days > CONFIG.DOCTOR_RETENTION_WARN_DAYS) {
        warnings.push(`${logType}: ${TEXT.DOCTOR_RETENTION_LONG} (${days} days)`);
      }
    }

    this.results.push({
      check: 'Retention Policy',
      status: warnings.length > 0 ? 'WARN' : 'OK',
      message: warnings.length > 0 ? TEXT.DOCTOR_RETENTION_LONG : TEXT.DOCTOR_RETENTION_OK,
      details: warnings.length > 0 ? warnings : details
    });
  }

  private getSummary(): DiagnosticSummary {
    return {
      total: this.results.length,
      passed: this.results.filter(r => r.status === 'OK').length,
      warnings: this.results.filter(r => r.status === 'WARN').length,
      errors: this.results.filter(r => r.status === 'ERROR').length
    };
  }

  private printSummary(): void {
    console.log('\n');
    this.results.forEach(result => printResult(result));

    printHeader(TEXT.DOCTOR_SUMMARY_HEADER);

    const summary = this.getSummary();
    const lineColor = summary.errors > 0 ? 'red' : summary.warnings > 0 ? 'yellow' : 'green';
    console.log(`${TEXT.DOCTOR_TOTAL_CHECKS}: ${summary.total}`);
    console.log(`${colorize(TEXT.DOCTOR_PASSED_CHECKS, 'green')}: ${summary.passed}`);
    console.log(`${colorize(TEXT.DOCTOR_WARNINGS, 'yellow')}: ${summary.warnings}`);
    console.log(`${colorize(TEXT.DOCTOR_ERRORS, 'red')}: ${summary.errors}`);

    console.log(`\n${colorize('━'.repeat(60), lineColor)}`);

    if (summary.errors === 0 && summary.warnings === 0) {
      console.log(`✅ ${colorize(TEXT.DOCTOR_CHECK_PASSED, 'green')}`);
    } else if (summary.errors === 0) {
      console.log(`⚠️  ${colorize(TEXT.DOCTOR_CHECK_WARNINGS, 'yellow')}`);
    } else {
      console.log(`❌ ${colorize(TEXT.DOCTOR_CHECK_ERRORS, 'red')}`);
    }

    console.log(`${colorize('━'.repeat(60), lineColor)}\n`);
  }
}

export function printDoctorHelp(): void {
  console.log(`
${colorize('Log Maintenance - Doctor CLI', 'cyan')}

${colorize('Description:', 'yellow')}
  ${TEXT.DOCTOR_HELP_TEXT}

${colorize('Usage:', 'yellow')}
  log-maintenance-doctor [config-file]

${colorize('Arguments:', 'yellow')}
  config-file    Path to configuration file (default: $${CONFIG.ENV_CONFIG_FILE} or ${CONFIG.DEFAULT_CONFIG_FILE})

${colorize('Exit Codes:', 'yellow')}
  0    All checks passed or only warnings
  2    Critical errors found

${colorize('Checks Performed:', 'yellow')}
  • Configuration schema validity
  • Rotation state ownership, permissions and format
  • Rotation utility and rules file
  • Log directory size
  • Retention periods for the configured environment
`);
}

if (isEntryPoint(import.meta.url)) {
  const args = process.argv.slice(2);

  if (args.includes(CONFIG.CLI_ARG_HELP_LONG) || args.includes(CONFIG.CLI_ARG_HELP_SHORT)) {
    printDoctorHelp();
    process.exitCode = CONFIG.EXIT_CODE_SUCCESS;
  } else {
    const doctor = new DoctorCLI(args[0]);
    doctor.run()
      .then((exitCode) => {
        process.exitCode = exitCode;
      })
      .catch((error: unknown) => {
        console.error(`\n❌ ${colorize('Fatal error:', 'red')}`);
        console.error(colorize(describeError(error), 'red'));
        process.exitCode = CONFIG.EXIT_CODE_ERROR;
      });
  }
}
