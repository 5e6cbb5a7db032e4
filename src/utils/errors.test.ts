import { describe, expect, it } from 'vitest';
import {
  MaintenanceError,
  ConfigurationError,
  StateStoreError,
  describeError,
  hasErrorCode,
  isErrnoException
} from './errors.js';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';

describe('MaintenanceError', () => {
  it('should create error with code, message and context', () => {
    const error = new MaintenanceError('TEST_CODE', 'Test message', { foo: 'bar' });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(MaintenanceError);
    expect(error.name).toBe('MaintenanceError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.context).toEqual({ foo: 'bar' });
  });

  it('should freeze its context', () => {
    const error = new MaintenanceError('TEST_CODE', 'Test message', { nested: { value: 1 } });

    expect(Object.isFrozen(error.context)).toBe(true);
  });

  it('should serialize to JSON without context', () => {
    const error = new MaintenanceError('TEST_CODE', 'Test message');

    expect(error.toJSON()).toEqual({
      name: 'MaintenanceError',
      code: 'TEST_CODE',
      message: 'Test message',
      context: undefined
    });
  });
});

describe('ConfigurationError', () => {
  it('should use the invalid config code', () => {
    const error = new ConfigurationError('Invalid config', 'logDir');

    expect(error).toBeInstanceOf(MaintenanceError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe(CONFIG.ERROR_CODE_INVALID_CONFIG);
    expect(error.context).toEqual({ field: 'logDir' });
  });

  it('should omit context without a field', () => {
    expect(new ConfigurationError('Invalid config').context).toBeUndefined();
  });
});

describe('StateStoreError', () => {
  it('should carry reason and location', () => {
    const error = new StateStoreError('corrupt', '/var/lib/logrotate/status', 'unexpected header "x"');

    expect(error).toBeInstanceOf(MaintenanceError);
    expect(error).toBeInstanceOf(StateStoreError);
    expect(error.name).toBe('StateStoreError');
    expect(error.code).toBe(CONFIG.ERROR_CODE_STATE_STORE);
    expect(error.reason).toBe('corrupt');
    expect(error.message).toBe(`${TEXT.ERROR_STATE_CORRUPT}: unexpected header "x"`);
    expect(error.context).toEqual({ reason: 'corrupt', location: '/var/lib/logrotate/status' });
  });

  it('should use the plain reason message without detail', () => {
    const error = new StateStoreError('unreadable', '/var/lib/logrotate/status');

    expect(error.message).toBe(TEXT.ERROR_STATE_UNREADABLE);
  });
});

describe('error helpers', () => {
  it('should recognize errno exceptions by their code', () => {
    const error = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });

    expect(isErrnoException(error)).toBe(true);
    expect(hasErrorCode(error, 'ENOENT')).toBe(true);
    expect(hasErrorCode(error, 'EACCES')).toBe(false);
    expect(hasErrorCode(new Error('plain'), 'ENOENT')).toBe(false);
    expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
  });

  it('should describe only the first line of a message', () => {
    expect(describeError(new Error('first line\nsecond line'))).toBe('first line');
    expect(describeError('plain string')).toBe('plain string');
  });
});
