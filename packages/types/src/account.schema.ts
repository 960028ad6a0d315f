/**
 * Account identifier and amount schemas
 *
 * Every ledger input passes through these before it reaches the bookkeeping
 * code, so a malformed identifier or an out-of-range amount can never be
 * stored.
 */

import { z } from 'zod';

/**
 * Largest value an Amount may hold (2^256 - 1)
 */
export const MAX_UINT256 = (1n << 256n) - 1n;

const ACCOUNT_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Account identifier: 0x followed by 40 hex digits
 * Normalized to lower case so that mixed-case spellings map to one key
 */
export const AccountSchema = z
  .string()
  .regex(ACCOUNT_PATTERN, 'Account must be 0x followed by 40 hex digits')
  .transform((value) => value.toLowerCase())
  .brand<'Account'>();

export type Account = z.output<typeof AccountSchema>;
export type AccountInput = z.input<typeof AccountSchema>;

/**
 * The null identifier: source of minted value, sink of burned value
 */
export const NULL_ACCOUNT: Account = AccountSchema.parse(`0x${'0'.repeat(40)}`);

/**
 * Amount in base units
 * - bigint as is
 * - safe non-negative integer numbers
 * - decimal digit strings (how amounts travel through JSON)
 */
export const AmountSchema = z
  .union([
    z.bigint(),
    z
      .number()
      .int('Amount must be a whole number of base units')
      .max(Number.MAX_SAFE_INTEGER, 'Amount numbers must be safe integers; pass a bigint or string'),
    z.string().regex(/^\d+$/, 'Amount strings must contain decimal digits only'),
  ])
  .transform((value) => BigInt(value))
  .pipe(
    z
      .bigint()
      .nonnegative('Amount must not be negative')
      .max(MAX_UINT256, 'Amount exceeds 2^256 - 1')
  );

export type Amount = z.output<typeof AmountSchema>;
export type AmountInput = z.input<typeof AmountSchema>;
