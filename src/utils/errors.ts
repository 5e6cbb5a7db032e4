import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { deepFreeze } from './immutability.js';

export class MaintenanceError extends Error {
  public readonly code: string;
  public readonly context?: Readonly<Record<string, unknown>>;

  constructor(
    code: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MaintenanceError';
    this.code = code;

    if (context) {
      this.context = deepFreeze({ ...context });
    }

    Object.setPrototypeOf(this, MaintenanceError.prototype);
  }

  toJSON(): Readonly<Record<string, unknown>> {
    return deepFreeze({
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    });
  }
}

export class ConfigurationError extends MaintenanceError {
  constructor(message: string, field?: string) {
    // Only include field name, never the value
    const context = field ? { field } : undefined;
    super(CONFIG.ERROR_CODE_INVALID_CONFIG, message, context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export type StateStoreFailureReason = 'permissions' | 'unreadable' | 'corrupt';

const STATE_STORE_MESSAGES: Record<StateStoreFailureReason, string> = {
  permissions: TEXT.ERROR_STATE_PERMISSIONS,
  unreadable: TEXT.ERROR_STATE_UNREADABLE,
  corrupt: TEXT.ERROR_STATE_CORRUPT
};

/**
 * Raised when the rotation state location exists but cannot be trusted.
 * Kept apart from the rotation utility's own exit status.
 */
export class StateStoreError extends MaintenanceError {
  public readonly reason: StateStoreFailureReason;

  constructor(reason: StateStoreFailureReason, location: string, detail?: string) {
    const message = detail
      ? `${STATE_STORE_MESSAGES[reason]}: ${detail}`
      : STATE_STORE_MESSAGES[reason];
    super(CONFIG.ERROR_CODE_STATE_STORE, message, { reason, location });
    this.name = 'StateStoreError';
    this.reason = reason;
    Object.setPrototypeOf(this, StateStoreError.prototype);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}

/**
 * Message of an unknown thrown value, first line only
 */
export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split(CONFIG.LINE_ENDING_PATTERN)[0] ?? TEXT.ERROR_EXECUTION_FAILED;
}
