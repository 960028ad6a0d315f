/**
 * Access Control
 *
 * Single-owner authorization plus the mint agent set.
 */

import { NULL_ACCOUNT, type Account } from '@mintable/types';
import { InvalidArgumentError, UnauthorizedError } from './ledger-errors.js';
import type { LedgerState, LedgerStateView } from './ledger-types.js';

/**
 * @throws {UnauthorizedError} If caller is not the owner
 */
export function requireOwner(state: LedgerStateView, caller: Account, action: string): void {
  if (state.getOwner() !== caller) {
    throw new UnauthorizedError(caller, action);
  }
}

/**
 * @throws {UnauthorizedError} If caller is not a mint agent
 */
export function requireMintAgent(state: LedgerStateView, caller: Account, action: string): void {
  if (!state.isMintAgent(caller)) {
    throw new UnauthorizedError(caller, action);
  }
}

/**
 * Hand ownership to another account
 *
 * Business rules:
 * - Only the owner may transfer ownership
 * - The new owner must differ from the current one and must not be null
 * - Balances, allowances and mint agents are untouched
 */
export function transferOwnership(state: LedgerState, caller: Account, newOwner: Account): void {
  requireOwner(state, caller, 'transfer ownership');

  if (newOwner === NULL_ACCOUNT) {
    throw new InvalidArgumentError('New owner must not be the null account');
  }
  if (newOwner === state.getOwner()) {
    throw new InvalidArgumentError(`${newOwner} is already the owner`);
  }

  state.setOwner(newOwner);
}

/**
 * Grant or revoke mint agent status
 * Notifies on every call, including ones that leave membership unchanged
 */
export function setMintAgent(
  state: LedgerState,
  caller: Account,
  addr: Account,
  enabled: boolean
): void {
  requireOwner(state, caller, 'change mint agents');

  state.setMintAgent(addr, enabled);
  state.record({ type: 'MintAgentChanged', addr, enabled });
}
