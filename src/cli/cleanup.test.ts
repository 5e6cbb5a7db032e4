import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { CLEANUP_USAGE, runCleanupCommand } from './cleanup.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import type { ConfigLoader } from '../services/config-loader.service.js';
import { ConfigurationError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logging.js';
import {
  FIXED_NOW,
  buildConfig,
  captureLogs,
  exists,
  makeTempDir,
  writeAgedFile
} from '../test-utils/maintenance-test-helpers.js';

describe('runCleanupCommand', () => {
  let logs: ReturnType<typeof captureLogs>;
  let root: string;
  let loader: ConfigLoader;

  beforeEach(async () => {
    logs = captureLogs();
    root = await makeTempDir();
    const config = buildConfig({ environment: 'production', logDir: root, retention: { days: { app: 30 } } });
    loader = {
      loadConfig: async () => config,
      getConfigPath: () => path.join(root, 'config.json')
    };
  });

  afterEach(async () => {
    setLogLevel('INFO');
    logs.restore();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should print usage for --help', async () => {
    const exitCode = await runCleanupCommand(['--help'], loader);

    expect(exitCode).toBe(0);
    expect(console.log).toHaveBeenCalledWith(CLEANUP_USAGE);
  });

  it('should remove expired artifacts and log a success outcome', async () => {
    await writeAgedFile(root, 'app_production.log.4.gz', 45);

    const exitCode = await runCleanupCommand([], loader, () => FIXED_NOW);

    expect(exitCode).toBe(0);
    expect(await exists(path.join(root, 'app_production.log.4.gz'))).toBe(false);
    const [outcome] = logs.outcomes();
    expect(outcome?.phase).toBe('cleanup');
    expect(outcome?.status).toBe(0);
    expect(outcome?.message).toBe(TEXT.CLEANUP_SUCCEEDED);
    expect(outcome?.['removed']).toBe(1);
  });

  it('should leave files in place with --dry-run', async () => {
    await writeAgedFile(root, 'app_production.log.4.gz', 45);

    const exitCode = await runCleanupCommand(['--dry-run'], loader, () => FIXED_NOW);

    expect(exitCode).toBe(0);
    expect(await exists(path.join(root, 'app_production.log.4.gz'))).toBe(true);
    expect(logs.outcomes()[0]?.['dryRun']).toBe(true);
  });

  it('should return 2 when the configuration is invalid', async () => {
    const broken: ConfigLoader = {
      loadConfig: async () => {
        throw new ConfigurationError('Configuration validation failed:\nversion: Invalid literal value');
      },
      getConfigPath: () => '/etc/log-maintenance/config.json'
    };

    const exitCode = await runCleanupCommand([], broken);

    expect(exitCode).toBe(CONFIG.EXIT_CODE_INVALID_CONFIG);
    const [failure] = logs.errors();
    expect(failure?.message).toBe(TEXT.ERROR_INVALID_CONFIG);
    expect(failure?.['error']).toBe('Configuration validation failed:');
  });
});
