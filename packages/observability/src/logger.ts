import { pino, stdSerializers, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger, LoggerOptions, DestinationStream } from 'pino';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert bigint values (at any depth) to decimal strings
 * Errors, dates and class instances are left for pino's serializers
 */
function toLoggable(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toLoggable);
  }
  if (isPlainObject(value)) {
    return stringifyAmounts(value);
  }
  return value;
}

export function stringifyAmounts(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = toLoggable(value);
  }
  return result;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels (LOG_LEVEL, default info)
 * - Amounts (bigint) rendered as decimal strings
 * - Standard error serialization under `err`
 * - ISO 8601 timestamps
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const settings: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    base: { service: 'mintable-ledger' },
    serializers: {
      err: stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: stringifyAmounts,
    },
    ...options,
  };

  return destination ? pino(settings, destination) : pino(settings);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
