/**
 * Ledger Domain Types
 *
 * These types define the interfaces between layers
 * (Service → bookkeeping functions → Repository)
 */

import type { Account, Amount, LedgerEvent, LedgerEventType } from '@mintable/types';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A notification recorded inside an open transaction
 * The sequence number is assigned at commit
 */
export type PendingLedgerEvent = DistributiveOmit<LedgerEvent, 'sequence'>;

export interface LedgerMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

/**
 * Read side of the ledger state
 */
export interface LedgerStateView {
  readonly metadata: LedgerMetadata;
  getBalance(account: Account): Amount;
  getAllowance(owner: Account, spender: Account): Amount;
  getTotalSupply(): Amount;
  getOwner(): Account;
  isMintAgent(account: Account): boolean;
}

/**
 * Mutable state handed to an operation for the duration of one transaction
 */
export interface LedgerState extends LedgerStateView {
  setBalance(account: Account, amount: Amount): void;
  setAllowance(owner: Account, spender: Account, amount: Amount): void;
  setTotalSupply(amount: Amount): void;
  setOwner(account: Account): void;
  setMintAgent(account: Account, enabled: boolean): void;
  record(event: PendingLedgerEvent): void;
}

export interface TransactionOutcome<T> {
  result: T;
  events: LedgerEvent[];
}

export interface HolderBalance {
  account: Account;
  balance: Amount;
}

export interface LedgerEventFilter {
  type?: LedgerEventType;
  /** Matches events where the account appears in any address field */
  account?: string;
  /** Inclusive lower bound on sequence */
  fromSequence?: number;
}

export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;
