import { describe, it, expect } from 'vitest';
import { CONFIG } from './config-constants.js';

describe('Config Constants', () => {
  it('should have version defined', () => {
    expect(CONFIG.VERSION).toBe('0.1.0');
    expect(CONFIG.CONFIG_SCHEMA_VERSION).toBe('1.0.0');
  });

  it('should have default locations', () => {
    expect(CONFIG.DEFAULT_LOGROTATE_STATE).toBe('/var/lib/logrotate/status');
    expect(CONFIG.DEFAULT_LOGROTATE_RULES).toBe('/etc/logrotate.d/log-maintenance');
    expect(CONFIG.DEFAULT_LOG_DIR).toBe('/app/logs');
  });

  it('should have retention defaults per log type and environment', () => {
    expect(CONFIG.DEFAULT_RETENTION_DAYS).toEqual({ audit: 90, app: 30, cli: 15, sql: 7 });
    expect(CONFIG.DEFAULT_RETENTION_MULTIPLIERS).toEqual({ development: 0.5, test: 0.25, production: 1 });
  });

  it('should have exit codes', () => {
    expect(CONFIG.EXIT_CODE_SUCCESS).toBe(0);
    expect(CONFIG.EXIT_CODE_ERROR).toBe(1);
    expect(CONFIG.EXIT_CODE_INVALID_CONFIG).toBe(2);
    expect(CONFIG.EXIT_CODE_MISSING_DEPENDENCY).toBe(3);
    expect(CONFIG.SIGNAL_EXIT_CODE_BASE).toBe(128);
  });

  it('should forbid group and world write on the state store', () => {
    expect(CONFIG.STATE_FORBIDDEN_MODE_BITS).toBe(0o022);
    expect(CONFIG.STATE_FILE_MODE & CONFIG.STATE_FORBIDDEN_MODE_BITS).toBe(0);
    expect(CONFIG.STATE_DIR_MODE & CONFIG.STATE_FORBIDDEN_MODE_BITS).toBe(0);
  });

  it('should recognize the logrotate state header', () => {
    expect(CONFIG.STATE_HEADER_PATTERN.test('logrotate state -- version 2')).toBe(true);
    expect(CONFIG.STATE_HEADER_PATTERN.test('logrotate state')).toBe(false);
  });
});
