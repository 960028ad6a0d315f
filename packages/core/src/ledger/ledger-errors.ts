/**
 * Ledger Domain Errors
 *
 * Every rejected operation throws one of these. The code is stable and
 * machine-readable; the message is for humans.
 */

export type LedgerErrorCode =
  | 'UNAUTHORIZED'
  | 'INVALID_ARGUMENT'
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_ALLOWANCE'
  | 'ALLOWANCE_RACE_CONDITION'
  | 'ARITHMETIC_OVERFLOW'
  | 'ARITHMETIC_UNDERFLOW'
  | 'DIVISION_BY_ZERO'
  | 'LEDGER_BUSY';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnauthorizedError extends LedgerError {
  constructor(caller: string, action: string) {
    super('UNAUTHORIZED', `${caller} is not authorized to ${action}`);
  }
}

export class InvalidArgumentError extends LedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_ARGUMENT', message, options);
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(account: string, balance: bigint, requested: bigint) {
    super(
      'INSUFFICIENT_BALANCE',
      `Balance of ${account} is ${balance}, cannot move ${requested}`
    );
  }
}

export class InsufficientAllowanceError extends LedgerError {
  constructor(owner: string, spender: string, allowance: bigint, requested: bigint) {
    super(
      'INSUFFICIENT_ALLOWANCE',
      `Allowance of ${spender} over ${owner} is ${allowance}, cannot move ${requested}`
    );
  }
}

export class AllowanceRaceConditionError extends LedgerError {
  constructor(owner: string, spender: string, current: bigint) {
    super(
      'ALLOWANCE_RACE_CONDITION',
      `Allowance of ${spender} over ${owner} is ${current}; set it to 0 before approving a new non-zero value`
    );
  }
}

export class ArithmeticOverflowError extends LedgerError {
  constructor(expression: string) {
    super('ARITHMETIC_OVERFLOW', `Arithmetic overflow: ${expression}`);
  }
}

export class ArithmeticUnderflowError extends LedgerError {
  constructor(expression: string) {
    super('ARITHMETIC_UNDERFLOW', `Arithmetic underflow: ${expression}`);
  }
}

export class DivisionByZeroError extends LedgerError {
  constructor(expression: string) {
    super('DIVISION_BY_ZERO', `Division by zero: ${expression}`);
  }
}

export class LedgerBusyError extends LedgerError {
  constructor() {
    super('LEDGER_BUSY', 'Another ledger operation is already in progress');
  }
}

export function isLedgerError(value: unknown): value is LedgerError {
  return value instanceof LedgerError;
}
