/**
 * Conversion between display strings ("1.5") and base units
 */

import type { Amount } from '@mintable/types';
import { InvalidArgumentError } from '../ledger/ledger-errors.js';
import { add, div, mul, pow10, sub } from './safe-math.js';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export function parseUnits(text: string, decimals: number): Amount {
  const match = DECIMAL_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidArgumentError(`"${text}" is not a decimal number`);
  }

  const whole = match[1] ?? '0';
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) {
    throw new InvalidArgumentError(
      `"${text}" has more than ${decimals} fractional digit${decimals === 1 ? '' : 's'}`
    );
  }

  const scaledWhole = mul(BigInt(whole), pow10(decimals));
  const scaledFraction = fraction ? BigInt(fraction.padEnd(decimals, '0')) : 0n;
  return add(scaledWhole, scaledFraction);
}

export function formatUnits(amount: Amount, decimals: number): string {
  const base = pow10(decimals);
  const whole = div(amount, base);
  const remainder = sub(amount, mul(whole, base));
  if (remainder === 0n) {
    return whole.toString();
  }

  const fraction = remainder.toString().padStart(decimals, '0').replace(/0+$/, '');
  return `${whole}.${fraction}`;
}
