/**
 * Ledger Domain
 *
 * Public exports for the fungible-token ledger
 */

// Entry point
export { createLedger } from './create-ledger.js';
export type { CreateLedgerParams } from './create-ledger.js';
export { loadLedgerConfig } from './ledger-config.js';

// Service layer
export { LedgerService } from './ledger-service.js';
export { LedgerEventEmitter } from './ledger-events.js';

// Repository layer
export { LedgerRepository, eventAccounts } from './ledger-repository.js';
export type { EventQuery } from './ledger-repository.js';

// Domain types
export type {
  HolderBalance,
  LedgerEventFilter,
  LedgerEventHandler,
  LedgerMetadata,
  LedgerState,
  LedgerStateView,
  PendingLedgerEvent,
  TransactionOutcome,
} from './ledger-types.js';

// Domain errors
export {
  LedgerError,
  UnauthorizedError,
  InvalidArgumentError,
  InsufficientBalanceError,
  InsufficientAllowanceError,
  AllowanceRaceConditionError,
  ArithmeticOverflowError,
  ArithmeticUnderflowError,
  DivisionByZeroError,
  LedgerBusyError,
  isLedgerError,
} from './ledger-errors.js';
export type { LedgerErrorCode } from './ledger-errors.js';
