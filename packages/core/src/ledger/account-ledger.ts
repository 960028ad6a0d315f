/**
 * Account Ledger
 *
 * Balance, allowance and supply transitions. Each function runs inside an
 * open transaction; throwing discards everything it wrote.
 */

import { NULL_ACCOUNT, type Account, type Amount } from '@mintable/types';
import { add, sub } from '../math/safe-math.js';
import { requireMintAgent, requireOwner } from './access-control.js';
import {
  AllowanceRaceConditionError,
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InvalidArgumentError,
} from './ledger-errors.js';
import type { LedgerState } from './ledger-types.js';

function requireNotNull(account: Account, role: string): void {
  if (account === NULL_ACCOUNT) {
    throw new InvalidArgumentError(`${role} must not be the null account`);
  }
}

function moveBalance(state: LedgerState, from: Account, to: Account, value: Amount): void {
  state.setBalance(from, sub(state.getBalance(from), value));
  state.setBalance(to, add(state.getBalance(to), value));
}

/**
 * Move value from the caller to another account
 *
 * @returns false (and changes nothing) when value is zero or exceeds the
 *   caller's balance
 * @throws {InvalidArgumentError} If `to` is the null account
 */
export function transfer(state: LedgerState, from: Account, to: Account, value: Amount): boolean {
  requireNotNull(to, 'Recipient');

  if (value === 0n || state.getBalance(from) < value) {
    return false;
  }

  moveBalance(state, from, to, value);
  state.record({ type: 'Transfer', from, to, value });
  return true;
}

/**
 * Move value out of `from` on the strength of the spender's allowance
 *
 * Unlike transfer, a shortfall here is an error, not a false result.
 */
export function transferFrom(
  state: LedgerState,
  spender: Account,
  from: Account,
  to: Account,
  value: Amount
): boolean {
  requireNotNull(to, 'Recipient');

  const balance = state.getBalance(from);
  if (value > balance) {
    throw new InsufficientBalanceError(from, balance, value);
  }

  const allowance = state.getAllowance(from, spender);
  if (value > allowance) {
    throw new InsufficientAllowanceError(from, spender, allowance, value);
  }

  state.setBalance(to, add(state.getBalance(to), value));
  state.setBalance(from, sub(state.getBalance(from), value));
  state.setAllowance(from, spender, sub(allowance, value));
  state.record({ type: 'Transfer', from, to, value });
  return true;
}

/**
 * Set an allowance outright
 * A non-zero allowance must be reset to zero before it can be set again.
 */
export function approve(state: LedgerState, owner: Account, spender: Account, value: Amount): boolean {
  requireNotNull(spender, 'Spender');

  const current = state.getAllowance(owner, spender);
  if (value !== 0n && current !== 0n) {
    throw new AllowanceRaceConditionError(owner, spender, current);
  }

  state.setAllowance(owner, spender, value);
  state.record({ type: 'Approval', owner, spender, value });
  return true;
}

export function increaseApproval(
  state: LedgerState,
  owner: Account,
  spender: Account,
  addedValue: Amount
): boolean {
  const value = add(state.getAllowance(owner, spender), addedValue);
  state.setAllowance(owner, spender, value);
  state.record({ type: 'Approval', owner, spender, value });
  return true;
}

/**
 * Lower an allowance, clamping at zero
 */
export function decreaseApproval(
  state: LedgerState,
  owner: Account,
  spender: Account,
  subtractedValue: Amount
): boolean {
  const current = state.getAllowance(owner, spender);
  const value = subtractedValue > current ? 0n : sub(current, subtractedValue);
  state.setAllowance(owner, spender, value);
  state.record({ type: 'Approval', owner, spender, value });
  return true;
}

/**
 * Create new supply in the mint agent's own balance
 */
export function mint(state: LedgerState, caller: Account, amount: Amount): void {
  requireMintAgent(state, caller, 'mint');

  state.setTotalSupply(add(state.getTotalSupply(), amount));
  state.setBalance(caller, add(state.getBalance(caller), amount));
  state.record({ type: 'Transfer', from: NULL_ACCOUNT, to: caller, value: amount });
  state.record({ type: 'Mint', to: caller, amount });
}

function destroy(state: LedgerState, from: Account, amount: Amount): void {
  if (amount === 0n || state.getBalance(from) < amount) {
    throw new InvalidArgumentError(
      `Cannot burn ${amount} from ${from}: amount must be positive and within its balance`
    );
  }

  state.setBalance(from, sub(state.getBalance(from), amount));
  state.setTotalSupply(sub(state.getTotalSupply(), amount));
  state.record({ type: 'Transfer', from, to: NULL_ACCOUNT, value: amount });
  state.record({ type: 'Burn', burner: from, amount });
}

/**
 * Owner-gated burn from any account
 */
export function burnFrom(state: LedgerState, caller: Account, from: Account, amount: Amount): void {
  requireOwner(state, caller, 'burn from an account');
  destroy(state, from, amount);
}

/**
 * Mint agent burns from its own balance
 */
export function burnSelf(state: LedgerState, caller: Account, amount: Amount): void {
  requireMintAgent(state, caller, 'burn');
  destroy(state, caller, amount);
}
