import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { main } from './index.js';
import { TEXT } from './constants/text-constants.js';
import { ConfigLoaderService } from './services/config-loader.service.js';
import { setLogLevel } from './utils/logging.js';
import {
  FIXED_NOW,
  FakeCommandRunner,
  VALID_STATE,
  captureLogs,
  commandResult,
  currentUid,
  exists,
  makeTempDir,
  writeAgedFile
} from './test-utils/maintenance-test-helpers.js';

describe('main', () => {
  let logs: ReturnType<typeof captureLogs>;
  let root: string;
  let logDir: string;
  let statePath: string;
  let configPath: string;
  let runner: FakeCommandRunner;

  // Stands in for logrotate: records its state the way the real utility does
  const rotatingRunner = () => new FakeCommandRunner(async (_command, args) => {
    const location = args[1];
    if (location) {
      await fs.writeFile(location, VALID_STATE);
    }
    return commandResult();
  });

  const run = () => main({
    loader: new ConfigLoaderService(configPath, {}),
    runner,
    clock: () => FIXED_NOW
  });

  beforeEach(async () => {
    logs = captureLogs();
    root = await makeTempDir();
    logDir = path.join(root, 'logs');
    statePath = path.join(root, 'state', 'status');
    configPath = path.join(root, 'config.json');
    await fs.mkdir(logDir);
    await fs.writeFile(configPath, JSON.stringify({
      version: '1.0.0',
      environment: 'production',
      logDir,
      rotation: {
        bin: '/usr/sbin/logrotate',
        rulesPath: path.join(root, 'logrotate.conf'),
        statePath,
        stateOwnerUid: currentUid()
      }
    }));
    runner = rotatingRunner();
  });

  afterEach(async () => {
    setLogLevel('INFO');
    logs.restore();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should initialize an absent state store, rotate, then clean up', async () => {
    await writeAgedFile(logDir, 'app_production.log.1', 5);
    await writeAgedFile(logDir, 'app_production.log.5.gz', 45);

    const exitCode = await run();

    expect(exitCode).toBe(0);
    expect(runner.calls).toEqual([{
      command: '/usr/sbin/logrotate',
      args: ['--state', statePath, path.join(root, 'logrotate.conf')]
    }]);
    expect(await fs.readFile(statePath, 'utf-8')).toBe(VALID_STATE);
    expect(await exists(path.join(logDir, 'app_production.log.1'))).toBe(true);
    expect(await exists(path.join(logDir, 'app_production.log.5.gz'))).toBe(false);
    expect(logs.outcomes().map(o => [o.phase, o.status])).toEqual([
      ['rotation', 0],
      ['cleanup', 0]
    ]);
  });

  it('should skip cleanup and pass through the rotation exit code', async () => {
    await writeAgedFile(logDir, 'app_production.log.5.gz', 45);
    runner = new FakeCommandRunner(async () => commandResult({
      exitCode: 1,
      stderr: 'error: error reading config file\n'
    }));

    const exitCode = await run();

    expect(exitCode).toBe(1);
    expect(await exists(path.join(logDir, 'app_production.log.5.gz'))).toBe(true);
    expect(logs.outcomes().map(o => [o.phase, o.status])).toEqual([['rotation', 1]]);
    expect(logs.errors()).toHaveLength(1);
    expect(logs.errors()[0]?.['reason']).toBe(`${TEXT.ERROR_ROTATION_EXITED} 1: error: error reading config file`);
  });

  it('should exit with 3 when the rotation utility is missing', async () => {
    runner = new FakeCommandRunner(async () => {
      throw Object.assign(new Error('spawn /usr/sbin/logrotate ENOENT'), { code: 'ENOENT' });
    });

    expect(await run()).toBe(3);
  });

  it('should fail rotation without running the utility when the state is corrupt', async () => {
    await fs.mkdir(path.dirname(statePath));
    await fs.chmod(path.dirname(statePath), 0o755);
    await fs.writeFile(statePath, 'garbage\n');
    await fs.chmod(statePath, 0o644);

    const exitCode = await run();

    expect(exitCode).toBe(1);
    expect(runner.calls).toHaveLength(0);
    expect(logs.errors()[0]?.['errorKind']).toBe('state_store');
  });

  it('should produce the same outcome on an immediate second run', async () => {
    await writeAgedFile(logDir, 'app_production.log.5.gz', 45);

    const first = await run();
    const second = await run();

    expect(first).toBe(0);
    expect(second).toBe(0);
    expect(runner.calls).toHaveLength(2);
    const cleanupOutcomes = logs.outcomes().filter(o => o.phase === 'cleanup');
    expect(cleanupOutcomes.map(o => o['removed'])).toEqual([1, 0]);
  });

  it('should return 2 for an invalid configuration without rotating', async () => {
    await fs.writeFile(configPath, JSON.stringify({ version: '9.9.9' }));

    const exitCode = await run();

    expect(exitCode).toBe(2);
    expect(runner.calls).toHaveLength(0);
    expect(logs.errors()[0]?.message).toBe(TEXT.ERROR_INVALID_CONFIG);
  });
});
