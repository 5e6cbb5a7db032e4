export const TEXT = {
  // Error messages
  ERROR_INVALID_CONFIG: 'Invalid configuration',
  ERROR_CONFIG_VALIDATION_FAILED: 'Configuration validation failed',
  ERROR_EXECUTION_FAILED: 'Execution failed',
  ERROR_STATE_PERMISSIONS: 'Rotation state has unsafe ownership or permissions',
  ERROR_STATE_UNREADABLE: 'Rotation state cannot be read',
  ERROR_STATE_CORRUPT: 'Rotation state has an unrecognized format',
  ERROR_ROTATION_BINARY_MISSING: 'Rotation utility not found',
  ERROR_ROTATION_SIGNALLED: 'Rotation utility was terminated by signal',
  ERROR_ROTATION_EXITED: 'Rotation utility exited with non-zero status',
  ERROR_CLEANUP_PARTIAL: 'Some log artifacts could not be removed',
  ERROR_UNKNOWN_LOG_LEVEL: 'Unknown log level',
  ERROR_ARCHIVE_DIR_IS_LOG_DIR: 'archiveDir must differ from logDir',

  // Run narration
  RUN_STARTED: 'Log maintenance run started',
  RUN_FINISHED: 'Log maintenance run finished',
  ROTATION_STARTED: 'Starting log rotation',
  ROTATION_SUCCEEDED: 'Log rotation completed successfully',
  ROTATION_FAILED: 'Log rotation failed',
  CLEANUP_STARTED: 'Starting retention cleanup',
  CLEANUP_SUCCEEDED: 'Retention cleanup completed successfully',
  CLEANUP_FAILED: 'Retention cleanup failed',
  CLEANUP_SKIPPED: 'Retention cleanup skipped because rotation failed',
  CLEANUP_DEFAULT_RETENTION: 'Using default retention',
  CLEANUP_NOTHING_TO_DO: 'No rotated log artifacts past retention',
  CLEANUP_LOG_DIR_MISSING: 'Log directory does not exist; nothing to clean',
  CLEANUP_REMOVED: 'Removed rotated log artifact',
  CLEANUP_ARCHIVED: 'Archived rotated log artifact',
  CLEANUP_WOULD_REMOVE: 'Would remove rotated log artifact',
  CLEANUP_WOULD_ARCHIVE: 'Would archive rotated log artifact',
  CLEANUP_REMOVE_FAILED: 'Failed to remove rotated log artifact',
  STATE_INITIALIZED: 'Initialized empty rotation state',
  CONFIG_LOADED: 'Configuration loaded',
  CONFIG_DEFAULTS: 'Configuration file not found, using defaults',

  // Doctor CLI
  DOCTOR_HEADER: 'Log Maintenance Doctor',
  DOCTOR_SUMMARY_HEADER: 'Summary',
  DOCTOR_CHECKING_CONFIG: 'Checking configuration...',
  DOCTOR_CHECKING_STATE: 'Checking rotation state store...',
  DOCTOR_CHECKING_BINARY: 'Checking rotation utility...',
  DOCTOR_CHECKING_RULES: 'Checking rotation rules...',
  DOCTOR_CHECKING_LOG_DIR: 'Checking log directory...',
  DOCTOR_CHECKING_RETENTION: 'Checking retention policy...',
  DOCTOR_CONFIG_VALID: 'Configuration is valid',
  DOCTOR_CONFIG_INVALID: 'Configuration is invalid',
  DOCTOR_STATE_OK: 'Rotation state store is safe to use',
  DOCTOR_STATE_ABSENT: 'Rotation state does not exist yet and will be initialized on first run',
  DOCTOR_BINARY_OK: 'Rotation utility is executable',
  DOCTOR_BINARY_MISSING: 'Rotation utility is missing or not executable',
  DOCTOR_RULES_OK: 'Rotation rules file is readable',
  DOCTOR_RULES_MISSING: 'Rotation rules file is missing or unreadable',
  DOCTOR_LOG_DIR_OK: 'Log directory is readable',
  DOCTOR_LOG_DIR_MISSING: 'Log directory does not exist',
  DOCTOR_LOG_DIR_LARGE: 'Log directory is larger than expected',
  DOCTOR_RETENTION_OK: 'Retention policy is reasonable',
  DOCTOR_RETENTION_LONG: 'Retention period is unusually long',
  DOCTOR_TOTAL_CHECKS: 'Total checks',
  DOCTOR_PASSED_CHECKS: 'Passed',
  DOCTOR_WARNINGS: 'Warnings',
  DOCTOR_ERRORS: 'Errors',
  DOCTOR_CHECK_PASSED: 'All checks passed',
  DOCTOR_CHECK_WARNINGS: 'Checks passed with warnings',
  DOCTOR_CHECK_ERRORS: 'Critical errors found',
  DOCTOR_HELP_TEXT: 'Diagnose log maintenance configuration before the scheduler runs it',

  // Cleanup CLI
  CLEANUP_HELP_TEXT: 'Remove or archive rotated log artifacts past their retention period',

  // Schema generation
  SCHEMA_TITLE: 'Log Maintenance Configuration',
  SCHEMA_DESCRIPTION: 'Configuration for scheduled log rotation and retention cleanup',
  SCHEMA_GENERATION_SUCCESS: 'JSON Schema generated',
  SCHEMA_GENERATION_FAILED: 'Failed to generate JSON Schema',
  SCHEMA_RETENTION_DAYS_DESC: 'Retention in days per log type, before the environment multiplier is applied'
} as const;

export type TextKey = keyof typeof TEXT;
