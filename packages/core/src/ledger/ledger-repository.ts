/**
 * Ledger Repository
 *
 * Owns the committed ledger state. All writes go through transaction():
 * the operation works on a copy-on-write draft that is committed in one step
 * when it returns and thrown away when it throws.
 */

import type { Account, Amount, LedgerEvent } from '@mintable/types';
import { LedgerBusyError } from './ledger-errors.js';
import type {
  HolderBalance,
  LedgerMetadata,
  LedgerState,
  LedgerStateView,
  PendingLedgerEvent,
  TransactionOutcome,
} from './ledger-types.js';

interface CommittedState {
  balances: Map<Account, Amount>;
  allowances: Map<string, Amount>;
  totalSupply: Amount;
  owner: Account;
  mintAgents: Set<Account>;
  events: LedgerEvent[];
}

export interface EventQuery {
  type?: LedgerEvent['type'];
  account?: Account;
  fromSequence?: number;
}

function allowanceKey(owner: Account, spender: Account): string {
  return `${owner}:${spender}`;
}

function compareAccounts(a: Account, b: Account): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function eventAccounts(event: LedgerEvent): Account[] {
  switch (event.type) {
    case 'Transfer':
      return [event.from, event.to];
    case 'Approval':
      return [event.owner, event.spender];
    case 'Mint':
      return [event.to];
    case 'Burn':
      return [event.burner];
    case 'MintAgentChanged':
      return [event.addr];
  }
}

/**
 * Pending writes layered over the committed state
 */
class LedgerDraft implements LedgerState {
  readonly balances = new Map<Account, Amount>();
  readonly allowances = new Map<string, Amount>();
  readonly mintAgents = new Map<Account, boolean>();
  readonly events: PendingLedgerEvent[] = [];
  totalSupply: Amount | undefined;
  owner: Account | undefined;

  constructor(
    private readonly base: CommittedState,
    readonly metadata: LedgerMetadata
  ) {}

  getBalance(account: Account): Amount {
    return this.balances.get(account) ?? this.base.balances.get(account) ?? 0n;
  }

  setBalance(account: Account, amount: Amount): void {
    this.balances.set(account, amount);
  }

  getAllowance(owner: Account, spender: Account): Amount {
    const key = allowanceKey(owner, spender);
    return this.allowances.get(key) ?? this.base.allowances.get(key) ?? 0n;
  }

  setAllowance(owner: Account, spender: Account, amount: Amount): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  getTotalSupply(): Amount {
    return this.totalSupply ?? this.base.totalSupply;
  }

  setTotalSupply(amount: Amount): void {
    this.totalSupply = amount;
  }

  getOwner(): Account {
    return this.owner ?? this.base.owner;
  }

  setOwner(account: Account): void {
    this.owner = account;
  }

  isMintAgent(account: Account): boolean {
    return this.mintAgents.get(account) ?? this.base.mintAgents.has(account);
  }

  setMintAgent(account: Account, enabled: boolean): void {
    this.mintAgents.set(account, enabled);
  }

  record(event: PendingLedgerEvent): void {
    this.events.push(event);
  }
}

export class LedgerRepository implements LedgerStateView {
  private readonly state: CommittedState;
  private busy = false;

  /**
   * Empty ledger: no supply, creator is owner and sole mint agent
   */
  constructor(
    readonly metadata: LedgerMetadata,
    creator: Account
  ) {
    this.state = {
      balances: new Map(),
      allowances: new Map(),
      totalSupply: 0n,
      owner: creator,
      mintAgents: new Set([creator]),
      events: [],
    };
  }

  /**
   * Run an operation against a draft and commit it atomically
   *
   * @throws {LedgerBusyError} If called while another transaction is open
   */
  transaction<T>(operation: (state: LedgerState) => T): TransactionOutcome<T> {
    if (this.busy) {
      throw new LedgerBusyError();
    }

    this.busy = true;
    try {
      const draft = new LedgerDraft(this.state, this.metadata);
      const result = operation(draft);
      const events = this.commit(draft);
      return { result, events };
    } finally {
      this.busy = false;
    }
  }

  getBalance(account: Account): Amount {
    return this.state.balances.get(account) ?? 0n;
  }

  getAllowance(owner: Account, spender: Account): Amount {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  getTotalSupply(): Amount {
    return this.state.totalSupply;
  }

  getOwner(): Account {
    return this.state.owner;
  }

  isMintAgent(account: Account): boolean {
    return this.state.mintAgents.has(account);
  }

  listMintAgents(): Account[] {
    return [...this.state.mintAgents].sort(compareAccounts);
  }

  /**
   * Accounts with a non-zero balance, sorted by account
   */
  listHolders(): HolderBalance[] {
    return [...this.state.balances.entries()]
      .map(([account, balance]) => ({ account, balance }))
      .sort((a, b) => compareAccounts(a.account, b.account));
  }

  findEvents(query: EventQuery = {}): LedgerEvent[] {
    const { type, account, fromSequence } = query;
    return this.state.events.filter(
      (event) =>
        (type === undefined || event.type === type) &&
        (fromSequence === undefined || event.sequence >= fromSequence) &&
        (account === undefined || eventAccounts(event).includes(account))
    );
  }

  private commit(draft: LedgerDraft): LedgerEvent[] {
    for (const [account, amount] of draft.balances) {
      if (amount === 0n) {
        this.state.balances.delete(account);
      } else {
        this.state.balances.set(account, amount);
      }
    }

    for (const [key, amount] of draft.allowances) {
      if (amount === 0n) {
        this.state.allowances.delete(key);
      } else {
        this.state.allowances.set(key, amount);
      }
    }

    for (const [account, enabled] of draft.mintAgents) {
      if (enabled) {
        this.state.mintAgents.add(account);
      } else {
        this.state.mintAgents.delete(account);
      }
    }

    if (draft.totalSupply !== undefined) {
      this.state.totalSupply = draft.totalSupply;
    }
    if (draft.owner !== undefined) {
      this.state.owner = draft.owner;
    }

    const committed = draft.events.map((event, index): LedgerEvent => {
      const stamped: LedgerEvent = { ...event, sequence: this.state.events.length + index + 1 };
      return Object.freeze(stamped);
    });
    this.state.events.push(...committed);
    return committed;
  }
}
