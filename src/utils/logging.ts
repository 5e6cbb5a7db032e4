import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import type { Phase, RunOutcome } from '../interfaces/phase-outcome.interface.js';

export type LogLevel = typeof CONFIG.LOG_LEVELS[number];

interface LogContext {
  level?: LogLevel;
  phase?: Phase;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40
};

let minimumLevel: LogLevel = CONFIG.DEFAULT_LOG_LEVEL;

export function isLogLevel(value: string): value is LogLevel {
  return CONFIG.LOG_LEVELS.some(level => level === value);
}

export function setLogLevel(level: string): void {
  const normalized = level.toUpperCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`${TEXT.ERROR_UNKNOWN_LOG_LEVEL}: ${level}`);
  }
  minimumLevel = normalized;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

// Rotation utility output is logged verbatim, so strip terminal control bytes
function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(CONFIG.REDACT_CONTROL_CHARS, '');
  }

  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value && typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = sanitizeValue(val);
    }
    return sanitized;
  }

  return value;
}

function writeLog(message: string, context: LogContext, defaultLevel: LogLevel): void {
  const { level = defaultLevel, phase, ...rest } = context;

  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }

  const sanitizedRest = sanitizeValue(rest);
  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    ...(phase ? { phase } : {}),
    message: sanitizeValue(message),
    ...(typeof sanitizedRest === 'object' && sanitizedRest !== null ? sanitizedRest : {})
  };

  // One JSON object per line on stdout, captured by the scheduler
  console.log(JSON.stringify(logEntry));
}

export function writeDebug(message: string, context: LogContext = {}): void {
  writeLog(message, context, CONFIG.LOG_LEVEL_DEBUG);
}

export function writeInfo(message: string, context: LogContext = {}): void {
  writeLog(message, context, CONFIG.LOG_LEVEL_INFO);
}

export function writeWarn(message: string, context: LogContext = {}): void {
  writeLog(message, context, CONFIG.LOG_LEVEL_WARN);
}

export function writeError(message: string, context: LogContext = {}): void {
  writeLog(message, context, CONFIG.LOG_LEVEL_ERROR);
}

/**
 * Emit the single outcome line for a finished phase.
 */
export function writeRunOutcome(outcome: RunOutcome, message: string, context: LogContext = {}): void {
  const level = outcome.status === CONFIG.EXIT_CODE_SUCCESS
    ? CONFIG.LOG_LEVEL_INFO
    : CONFIG.LOG_LEVEL_ERROR;

  writeLog(message, {
    ...context,
    level,
    phase: outcome.phase,
    event: CONFIG.EVENT_PHASE_OUTCOME,
    status: outcome.status,
    outcomeTimestamp: outcome.timestamp
  }, level);
}
