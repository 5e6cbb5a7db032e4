import { describe, it, expect } from 'vitest';
import { TEXT } from './text-constants.js';

describe('Text Constants', () => {
  it('should have error messages defined', () => {
    expect(TEXT.ERROR_INVALID_CONFIG).toBe('Invalid configuration');
    expect(TEXT.ERROR_ROTATION_BINARY_MISSING).toBe('Rotation utility not found');
    expect(TEXT.ERROR_CLEANUP_PARTIAL).toBe('Some log artifacts could not be removed');
  });

  it('should have phase outcome messages defined', () => {
    expect(TEXT.ROTATION_SUCCEEDED).toBe('Log rotation completed successfully');
    expect(TEXT.ROTATION_FAILED).toBe('Log rotation failed');
    expect(TEXT.CLEANUP_SUCCEEDED).toBe('Retention cleanup completed successfully');
    expect(TEXT.CLEANUP_FAILED).toBe('Retention cleanup failed');
  });

  it('should have unique values for all constants', () => {
    const values = Object.values(TEXT);

    expect(new Set(values).size).toBe(values.length);
  });
});
