import { z } from 'zod';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { ConfigurationError } from '../utils/errors.js';

export const EnvironmentSchema = z.enum(CONFIG.SUPPORTED_ENVIRONMENTS);

export const LogLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toUpperCase() : value),
  z.enum(CONFIG.LOG_LEVELS)
);

const PathString = z.string().trim().min(1);

const LogTypeString = z.string().regex(CONFIG.LOG_TYPE_REGEX, {
  message: 'Log type must be lowercase letters, digits or dashes'
});

const RotationSchema = z.object({
  bin: PathString.default(CONFIG.DEFAULT_LOGROTATE_BIN),
  rulesPath: PathString.default(CONFIG.DEFAULT_LOGROTATE_RULES),
  statePath: PathString.default(CONFIG.DEFAULT_LOGROTATE_STATE),
  stateOwnerUid: z.number().int().nonnegative().default(CONFIG.DEFAULT_STATE_OWNER_UID),
  verbose: z.boolean().default(false)
});

const RetentionSchema = z.object({
  days: z.record(LogTypeString, z.number().int().positive())
    .default({ ...CONFIG.DEFAULT_RETENTION_DAYS }),
  defaultDays: z.number().int().positive().default(CONFIG.DEFAULT_BASE_RETENTION_DAYS),
  multipliers: z.record(EnvironmentSchema, z.number().positive())
    .default({ ...CONFIG.DEFAULT_RETENTION_MULTIPLIERS }),
  maxTotalSizeMb: z.number().positive().optional(),
  dryRun: z.boolean().default(false)
});

export const MaintenanceConfigSchema = z.object({
  version: z.literal(CONFIG.CONFIG_SCHEMA_VERSION),
  environment: EnvironmentSchema.default(CONFIG.DEFAULT_ENVIRONMENT),
  logLevel: LogLevelSchema.default(CONFIG.DEFAULT_LOG_LEVEL),
  logDir: PathString.default(CONFIG.DEFAULT_LOG_DIR),
  archiveDir: PathString.optional(),
  rotation: RotationSchema.default({}),
  retention: RetentionSchema.default({})
});

export type Environment = z.infer<typeof EnvironmentSchema>;
export type MaintenanceConfig = z.infer<typeof MaintenanceConfigSchema>;
export type MaintenanceConfigInput = z.input<typeof MaintenanceConfigSchema>;

export type FrozenMaintenanceConfig = {
  readonly version: typeof CONFIG.CONFIG_SCHEMA_VERSION;
  readonly environment: Environment;
  readonly logLevel: MaintenanceConfig['logLevel'];
  readonly logDir: string;
  readonly archiveDir?: string;
  readonly rotation: Readonly<MaintenanceConfig['rotation']>;
  readonly retention: Readonly<{
    days: Readonly<Record<string, number>>;
    defaultDays: number;
    multipliers: Readonly<Partial<Record<Environment, number>>>;
    maxTotalSizeMb?: number;
    dryRun: boolean;
  }>;
};

export function validateMaintenanceConfig(data: unknown): MaintenanceConfig {
  const result = MaintenanceConfigSchema.safeParse(data);
  if (!result.success) {
    const messages = result.error.errors.map(err => {
      const path = err.path.join('.');
      return `${path}: ${err.message}`;
    });
    throw new ConfigurationError(`${TEXT.ERROR_CONFIG_VALIDATION_FAILED}:\n${messages.join('\n')}`);
  }
  return result.data;
}

export function hasConfiguredRetention(
  config: Pick<FrozenMaintenanceConfig, 'retention'>,
  logType: string
): boolean {
  return Object.hasOwn(config.retention.days, logType);
}

/**
 * Retention in whole days for a log type after the environment multiplier.
 * Log types without their own entry use `retention.defaultDays`.
 */
export function getRetentionDays(
  config: Pick<FrozenMaintenanceConfig, 'environment' | 'retention'>,
  logType: string
): number {
  const configured = hasConfiguredRetention(config, logType) ? config.retention.days[logType] : undefined;
  const baseDays = configured ?? config.retention.defaultDays;
  const multiplier = config.retention.multipliers[config.environment] ?? 1;
  return Math.max(Math.trunc(baseDays * multiplier), CONFIG.MIN_RETENTION_DAYS);
}
