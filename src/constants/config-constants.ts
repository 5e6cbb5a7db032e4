import { PACKAGE_VERSION, PACKAGE_NAME } from '../utils/package-info.js';

export const CONFIG = {
  // Version
  VERSION: PACKAGE_VERSION,
  SERVICE_NAME: PACKAGE_NAME,
  CONFIG_SCHEMA_VERSION: '1.0.0',

  // File paths
  DEFAULT_CONFIG_FILE: '/etc/log-maintenance/config.json',
  DEFAULT_LOG_DIR: '/app/logs',
  DEFAULT_LOGROTATE_BIN: '/usr/sbin/logrotate',
  DEFAULT_LOGROTATE_RULES: '/etc/logrotate.d/log-maintenance',
  DEFAULT_LOGROTATE_STATE: '/var/lib/logrotate/status',

  // Environment variables
  ENV_CONFIG_FILE: 'LOG_MAINTENANCE_CONFIG',
  ENV_ENVIRONMENT: 'ENVIRONMENT',
  ENV_LOG_DIR: 'LOG_DIR',
  ENV_LOGROTATE_RULES: 'LOGROTATE_RULES',
  ENV_LOGROTATE_STATE: 'LOGROTATE_STATE',
  ENV_LOGROTATE_BIN: 'LOGROTATE_BIN',
  ENV_LOG_LEVEL: 'LOG_LEVEL',

  // Environments
  SUPPORTED_ENVIRONMENTS: ['development', 'test', 'production'] as const,
  DEFAULT_ENVIRONMENT: 'development',

  // Retention defaults (days per log type)
  DEFAULT_RETENTION_DAYS: {
    audit: 90,
    app: 30,
    cli: 15,
    sql: 7
  },
  DEFAULT_RETENTION_MULTIPLIERS: {
    development: 0.5,
    test: 0.25,
    production: 1.0
  },
  DEFAULT_BASE_RETENTION_DAYS: 30,
  MIN_RETENTION_DAYS: 1,

  // Log artifact naming
  // <type>[_<environment>].log followed by .N or -YYYYMMDD, optionally .gz
  ROTATED_ARTIFACT_PATTERN: /^([a-z][a-z0-9-]*)(?:_[A-Za-z0-9-]+)?\.log(?:\.\d+|-\d{8})(?:\.gz)?$/,
  LOG_TYPE_REGEX: /^[a-z][a-z0-9-]*$/,

  // State store
  STATE_HEADER_PATTERN: /^logrotate state -- version \d+$/,
  STATE_DIR_MODE: 0o755,
  STATE_FILE_MODE: 0o644,
  STATE_FORBIDDEN_MODE_BITS: 0o022,
  STATE_TEMP_SUFFIX: '.tmp',
  DEFAULT_STATE_OWNER_UID: 0,

  // Phases
  PHASE_ROTATION: 'rotation',
  PHASE_CLEANUP: 'cleanup',
  EVENT_PHASE_OUTCOME: 'phase_outcome',

  // Log levels
  LOG_LEVEL_ERROR: 'ERROR',
  LOG_LEVEL_WARN: 'WARN',
  LOG_LEVEL_INFO: 'INFO',
  LOG_LEVEL_DEBUG: 'DEBUG',
  DEFAULT_LOG_LEVEL: 'INFO',
  LOG_LEVELS: ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const,

  // Error codes
  ERROR_CODE_INVALID_CONFIG: 'invalid_config',
  ERROR_CODE_STATE_STORE: 'state_store',
  ERROR_CODE_EXECUTION_FAILED: 'execution_failed',

  // Exit codes
  EXIT_CODE_SUCCESS: 0,
  EXIT_CODE_ERROR: 1,
  EXIT_CODE_INVALID_CONFIG: 2,
  EXIT_CODE_MISSING_DEPENDENCY: 3,
  SIGNAL_EXIT_CODE_BASE: 128,

  // Rotation command flags
  LOGROTATE_FLAG_STATE: '--state',
  LOGROTATE_FLAG_VERBOSE: '--verbose',

  // File system error codes
  FS_ERROR_ENOENT: 'ENOENT',
  FS_ERROR_EXDEV: 'EXDEV',

  // Unit conversion constants
  BYTES_PER_MB: 1024 * 1024,
  MS_PER_DAY: 24 * 60 * 60 * 1000,

  // Line ending pattern
  LINE_ENDING_PATTERN: /\r?\n/,
  REDACT_CONTROL_CHARS: /[\x00-\x08\x0B-\x1F\x7F]/g,

  // Default values
  DEFAULT_ENCODING: 'utf-8' as const,

  // URL schemes
  FILE_URL_SCHEME: 'file://',

  // JSON Schema metadata
  JSON_SCHEMA_DRAFT: 'http://json-schema.org/draft-07/schema#',
  JSON_SCHEMA_ID_PREFIX: 'log-maintenance',
  JSON_SCHEMA_VERSION: 'v1.0.0',
  JSON_SCHEMA_FILENAME: 'log-maintenance.config.schema.json',
  JSON_SCHEMA_NAME: 'MaintenanceConfig',
  JSON_INDENT_SIZE: 2,

  // CLI arguments
  CLI_ARG_HELP_LONG: '--help' as const,
  CLI_ARG_HELP_SHORT: '-h' as const,
  CLI_ARG_DRY_RUN: '--dry-run' as const,

  // CLI status values
  CLI_STATUS_OK: 'OK' as const,
  CLI_STATUS_WARN: 'WARN' as const,
  CLI_STATUS_ERROR: 'ERROR' as const,

  // Doctor CLI thresholds
  DOCTOR_RETENTION_WARN_DAYS: 365,
  DOCTOR_LOG_DIR_SIZE_WARN_MB: 1024
} as const;

export type ConfigKey = keyof typeof CONFIG;
