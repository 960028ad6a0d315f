/**
 * Checked arithmetic over 256-bit unsigned amounts
 *
 * bigint never wraps, so each operation checks its result against the
 * [0, 2^256 - 1] range and throws instead of producing an out-of-range value.
 */

import { MAX_UINT256, type Amount } from '@mintable/types';
import {
  ArithmeticOverflowError,
  ArithmeticUnderflowError,
  DivisionByZeroError,
  InvalidArgumentError,
} from '../ledger/ledger-errors.js';

export function add(a: Amount, b: Amount): Amount {
  const result = a + b;
  if (result > MAX_UINT256) {
    throw new ArithmeticOverflowError(`${a} + ${b}`);
  }
  return result;
}

export function sub(a: Amount, b: Amount): Amount {
  if (b > a) {
    throw new ArithmeticUnderflowError(`${a} - ${b}`);
  }
  return a - b;
}

export function mul(a: Amount, b: Amount): Amount {
  if (a === 0n) {
    return 0n;
  }
  const result = a * b;
  if (result > MAX_UINT256) {
    throw new ArithmeticOverflowError(`${a} * ${b}`);
  }
  return result;
}

export function div(a: Amount, b: Amount): Amount {
  if (b === 0n) {
    throw new DivisionByZeroError(`${a} / 0`);
  }
  return a / b;
}

/**
 * 10^exponent, for scaling whole units to base units
 */
export function pow10(exponent: number): Amount {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new InvalidArgumentError(`Exponent must be a non-negative integer, got ${exponent}`);
  }
  let result = 1n;
  for (let i = 0; i < exponent; i++) {
    result = mul(result, 10n);
  }
  return result;
}
