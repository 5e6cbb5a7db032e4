import { promises as fs } from 'fs';
import * as path from 'path';
import {
  EnvironmentSchema,
  type FrozenMaintenanceConfig,
  LogLevelSchema,
  type MaintenanceConfig,
  validateMaintenanceConfig
} from '../schemas/config.schema.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { ConfigurationError, hasErrorCode } from '../utils/errors.js';
import { deepFreeze } from '../utils/immutability.js';

export interface ConfigLoader {
  loadConfig(): Promise<FrozenMaintenanceConfig>;
  getConfigPath(): string;
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[CONFIG.ENV_CONFIG_FILE]?.trim();
  return fromEnv ? fromEnv : CONFIG.DEFAULT_CONFIG_FILE;
}

export class ConfigLoaderService implements ConfigLoader {
  private cachedConfig: FrozenMaintenanceConfig | null = null;
  private usedDefaults = false;

  constructor(
    private readonly configPath: string = resolveConfigPath(),
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  getConfigPath(): string {
    return this.configPath;
  }

  /** True when the last load found no file and fell back to defaults. */
  isUsingDefaults(): boolean {
    return this.usedDefaults;
  }

  async loadConfig(): Promise<FrozenMaintenanceConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const data = await this.readConfigFile();
    const config = this.applyEnvironmentOverrides(validateMaintenanceConfig(data));
    this.assertArchiveOutsideLogDir(config);

    this.cachedConfig = deepFreeze(config);
    return this.cachedConfig;
  }

  private async readConfigFile(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, CONFIG.DEFAULT_ENCODING);
    } catch (error) {
      // A missing file means every setting takes its default
      if (hasErrorCode(error, CONFIG.FS_ERROR_ENOENT)) {
        this.usedDefaults = true;
        return { version: CONFIG.CONFIG_SCHEMA_VERSION };
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch {
      throw new ConfigurationError(
        `${TEXT.ERROR_INVALID_CONFIG}: Invalid JSON in ${this.configPath}`
      );
    }
  }

  private applyEnvironmentOverrides(config: MaintenanceConfig): MaintenanceConfig {
    const overridden: MaintenanceConfig = {
      ...config,
      rotation: { ...config.rotation },
      retention: { ...config.retention }
    };

    const environment = this.readEnv(CONFIG.ENV_ENVIRONMENT);
    if (environment !== undefined) {
      const parsed = EnvironmentSchema.safeParse(environment);
      if (!parsed.success) {
        throw new ConfigurationError(
          `${TEXT.ERROR_INVALID_CONFIG}: ${CONFIG.ENV_ENVIRONMENT} must be one of ${CONFIG.SUPPORTED_ENVIRONMENTS.join(', ')}`,
          CONFIG.ENV_ENVIRONMENT
        );
      }
      overridden.environment = parsed.data;
    }

    const logLevel = this.readEnv(CONFIG.ENV_LOG_LEVEL);
    if (logLevel !== undefined) {
      const parsed = LogLevelSchema.safeParse(logLevel);
      if (!parsed.success) {
        throw new ConfigurationError(
          `${TEXT.ERROR_UNKNOWN_LOG_LEVEL}: ${logLevel}`,
          CONFIG.ENV_LOG_LEVEL
        );
      }
      overridden.logLevel = parsed.data;
    }

    overridden.logDir = this.readEnv(CONFIG.ENV_LOG_DIR) ?? overridden.logDir;
    overridden.rotation.rulesPath = this.readEnv(CONFIG.ENV_LOGROTATE_RULES) ?? overridden.rotation.rulesPath;
    overridden.rotation.statePath = this.readEnv(CONFIG.ENV_LOGROTATE_STATE) ?? overridden.rotation.statePath;
    overridden.rotation.bin = this.readEnv(CONFIG.ENV_LOGROTATE_BIN) ?? overridden.rotation.bin;

    return overridden;
  }

  // The archive must sit outside the scanned directory
  private assertArchiveOutsideLogDir(config: MaintenanceConfig): void {
    if (config.archiveDir !== undefined && path.resolve(config.archiveDir) === path.resolve(config.logDir)) {
      throw new ConfigurationError(
        `${TEXT.ERROR_INVALID_CONFIG}: ${TEXT.ERROR_ARCHIVE_DIR_IS_LOG_DIR} (${config.logDir})`,
        'archiveDir'
      );
    }
  }

  private readEnv(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }
}
