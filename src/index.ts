#!/usr/bin/env node

import { CONFIG } from './constants/config-constants.js';
import { TEXT } from './constants/text-constants.js';
import type { CommandRunner } from './interfaces/rotation-engine.interface.js';
import type { FrozenMaintenanceConfig } from './schemas/config.schema.js';
import { ConfigLoaderService, type ConfigLoader } from './services/config-loader.service.js';
import { MaintenanceCoordinator } from './services/coordinator.service.js';
import { FileRotationStateStore } from './services/file-state-store.service.js';
import { LogrotateEngine } from './services/logrotate-engine.service.js';
import { RetentionCleanupService } from './services/retention-cleanup.service.js';
import { isEntryPoint } from './utils/entry-point.js';
import { describeError } from './utils/errors.js';
import { setLogLevel, writeError, writeInfo } from './utils/logging.js';

export interface MainOptions {
  loader?: ConfigLoader;
  runner?: CommandRunner;
  clock?: () => Date;
}

export async function loadConfiguration(loader: ConfigLoader = new ConfigLoaderService()): Promise<FrozenMaintenanceConfig> {
  const config = await loader.loadConfig();
  setLogLevel(config.logLevel);
  writeInfo(TEXT.CONFIG_LOADED, {
    configPath: loader.getConfigPath(),
    environment: config.environment,
    logDir: config.logDir,
    statePath: config.rotation.statePath
  });
  return config;
}

export function createServices(config: FrozenMaintenanceConfig, options: MainOptions = {}) {
  const stateStore = new FileRotationStateStore(config.rotation.statePath, {
    ownerUid: config.rotation.stateOwnerUid
  });
  const rotationEngine = new LogrotateEngine(
    stateStore,
    {
      bin: config.rotation.bin,
      rulesPath: config.rotation.rulesPath,
      verbose: config.rotation.verbose
    },
    options.runner
  );
  const retentionCleanup = new RetentionCleanupService(config, options.clock);

  return { stateStore, rotationEngine, retentionCleanup };
}

/**
 * Runs one maintenance pass and resolves with the process exit code.
 */
export async function main(options: MainOptions = {}): Promise<number> {
  let config: FrozenMaintenanceConfig;
  try {
    config = await loadConfiguration(options.loader);
  } catch (error) {
    writeError(TEXT.ERROR_INVALID_CONFIG, {
      code: CONFIG.ERROR_CODE_INVALID_CONFIG,
      error: describeError(error)
    });
    return CONFIG.EXIT_CODE_INVALID_CONFIG;
  }

  const coordinator = new MaintenanceCoordinator({
    ...createServices(config, options),
    clock: options.clock
  });
  return coordinator.run();
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      writeError(TEXT.ERROR_EXECUTION_FAILED, {
        code: CONFIG.ERROR_CODE_EXECUTION_FAILED,
        error: describeError(error)
      });
      process.exitCode = CONFIG.EXIT_CODE_ERROR;
    });
}
