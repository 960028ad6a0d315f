/**
 * @mintable/observability
 *
 * Structured logging for the mintable ledger.
 */

export { createLogger, logger, stringifyAmounts } from './logger.js';
export type { Logger, LoggerOptions, DestinationStream } from './logger.js';
