/**
 * Ledger Service
 *
 * Public operation surface of the ledger. Each operation parses its input,
 * runs the bookkeeping inside one repository transaction, logs the outcome
 * and hands committed notifications to subscribers.
 */

import {
  AccountSchema,
  AllowanceQuerySchema,
  ApproveRequestSchema,
  BalanceQuerySchema,
  BurnFromRequestSchema,
  BurnSelfRequestSchema,
  DecreaseApprovalRequestSchema,
  IncreaseApprovalRequestSchema,
  MintRequestSchema,
  SetMintAgentRequestSchema,
  TransferFromRequestSchema,
  TransferOwnershipRequestSchema,
  TransferRequestSchema,
  type Account,
  type Amount,
  type ApproveParams,
  type BurnFromParams,
  type BurnSelfParams,
  type DecreaseApprovalParams,
  type IncreaseApprovalParams,
  type LedgerEvent,
  type MintParams,
  type SetMintAgentParams,
  type TransferFromParams,
  type TransferOwnershipParams,
  type TransferParams,
} from '@mintable/types';
import type { Logger } from '@mintable/observability';
import * as accessControl from './access-control.js';
import * as accounts from './account-ledger.js';
import { isLedgerError } from './ledger-errors.js';
import type { LedgerEventEmitter } from './ledger-events.js';
import type { LedgerRepository } from './ledger-repository.js';
import type {
  HolderBalance,
  LedgerEventFilter,
  LedgerEventHandler,
  LedgerState,
  TransactionOutcome,
} from './ledger-types.js';
import { parseInput } from './validation.js';

export class LedgerService {
  constructor(
    private repository: LedgerRepository,
    private emitter: LedgerEventEmitter,
    private logger: Logger
  ) {}

  // ---------------------------------------------------------------------------
  // Metadata and reads
  // ---------------------------------------------------------------------------

  name(): string {
    return this.repository.metadata.name;
  }

  symbol(): string {
    return this.repository.metadata.symbol;
  }

  decimals(): number {
    return this.repository.metadata.decimals;
  }

  totalSupply(): Amount {
    return this.repository.getTotalSupply();
  }

  owner(): Account {
    return this.repository.getOwner();
  }

  isMintAgent(account: string): boolean {
    return this.repository.isMintAgent(parseInput(AccountSchema, account));
  }

  mintAgents(): Account[] {
    return this.repository.listMintAgents();
  }

  /**
   * @returns 0 for accounts that never held a balance
   */
  balanceOf(account: string): Amount {
    const query = parseInput(BalanceQuerySchema, { account });
    return this.repository.getBalance(query.account);
  }

  /**
   * @returns 0 when no allowance was ever set
   */
  allowanceOf(owner: string, spender: string): Amount {
    const query = parseInput(AllowanceQuerySchema, { owner, spender });
    return this.repository.getAllowance(query.owner, query.spender);
  }

  holders(): HolderBalance[] {
    return this.repository.listHolders();
  }

  /**
   * Committed notifications in sequence order
   */
  events(filter: LedgerEventFilter = {}): LedgerEvent[] {
    return this.repository.findEvents({
      type: filter.type,
      account: filter.account === undefined ? undefined : parseInput(AccountSchema, filter.account),
      fromSequence: filter.fromSequence,
    });
  }

  /**
   * Subscribe to notifications as they are committed
   *
   * @returns Function that removes the handler
   */
  on(handler: LedgerEventHandler): () => void {
    return this.emitter.on(handler);
  }

  /**
   * Unsubscribe every handler, e.g. when a monitor is being replaced
   */
  removeAllHandlers(): void {
    this.emitter.removeAllHandlers();
  }

  // ---------------------------------------------------------------------------
  // Account ledger
  // ---------------------------------------------------------------------------

  /**
   * Move value from the caller to `to`
   *
   * @returns false when value is zero or exceeds the caller's balance;
   *   nothing changes and nothing is emitted in that case
   * @throws {InvalidArgumentError} If `to` is the null account
   */
  transfer(params: TransferParams): boolean {
    return this.execute('transfer', params.caller, (state) => {
      const { caller, to, value } = parseInput(TransferRequestSchema, params);
      return accounts.transfer(state, caller, to, value);
    });
  }

  /**
   * Spend an allowance the `from` account granted to the caller
   *
   * @throws {InvalidArgumentError} If `to` is the null account
   * @throws {InsufficientBalanceError} If value exceeds the balance of `from`
   * @throws {InsufficientAllowanceError} If value exceeds the caller's allowance
   */
  transferFrom(params: TransferFromParams): boolean {
    return this.execute('transferFrom', params.caller, (state) => {
      const { caller, from, to, value } = parseInput(TransferFromRequestSchema, params);
      return accounts.transferFrom(state, caller, from, to, value);
    });
  }

  /**
   * @throws {InvalidArgumentError} If spender is the null account
   * @throws {AllowanceRaceConditionError} If both the current and the new allowance are non-zero
   */
  approve(params: ApproveParams): boolean {
    return this.execute('approve', params.caller, (state) => {
      const { caller, spender, value } = parseInput(ApproveRequestSchema, params);
      return accounts.approve(state, caller, spender, value);
    });
  }

  increaseApproval(params: IncreaseApprovalParams): boolean {
    return this.execute('increaseApproval', params.caller, (state) => {
      const { caller, spender, addedValue } = parseInput(IncreaseApprovalRequestSchema, params);
      return accounts.increaseApproval(state, caller, spender, addedValue);
    });
  }

  decreaseApproval(params: DecreaseApprovalParams): boolean {
    return this.execute('decreaseApproval', params.caller, (state) => {
      const { caller, spender, subtractedValue } = parseInput(
        DecreaseApprovalRequestSchema,
        params
      );
      return accounts.decreaseApproval(state, caller, spender, subtractedValue);
    });
  }

  // ---------------------------------------------------------------------------
  // Supply
  // ---------------------------------------------------------------------------

  /**
   * @throws {UnauthorizedError} If the caller is not a mint agent
   */
  mint(params: MintParams): void {
    const { caller, amount } = this.execute('mint', params.caller, (state) => {
      const request = parseInput(MintRequestSchema, params);
      accounts.mint(state, request.caller, request.amount);
      return request;
    });
    this.logger.info({ caller, amount }, 'Minted');
  }

  /**
   * Owner burns from any account
   *
   * @throws {UnauthorizedError} If the caller is not the owner
   * @throws {InvalidArgumentError} If amount is zero or exceeds the balance of `from`
   */
  burnFrom(params: BurnFromParams): void {
    const { caller, from, amount } = this.execute('burnFrom', params.caller, (state) => {
      const request = parseInput(BurnFromRequestSchema, params);
      accounts.burnFrom(state, request.caller, request.from, request.amount);
      return request;
    });
    this.logger.info({ caller, from, amount }, 'Burned');
  }

  /**
   * Mint agent burns from its own balance
   *
   * @throws {UnauthorizedError} If the caller is not a mint agent
   * @throws {InvalidArgumentError} If amount is zero or exceeds the caller's balance
   */
  burnSelf(params: BurnSelfParams): void {
    const { caller, amount } = this.execute('burnSelf', params.caller, (state) => {
      const request = parseInput(BurnSelfRequestSchema, params);
      accounts.burnSelf(state, request.caller, request.amount);
      return request;
    });
    this.logger.info({ caller, from: caller, amount }, 'Burned');
  }

  // ---------------------------------------------------------------------------
  // Access control
  // ---------------------------------------------------------------------------

  /**
   * @throws {UnauthorizedError} If the caller is not the owner
   * @throws {InvalidArgumentError} If newOwner is null or already the owner
   */
  transferOwnership(params: TransferOwnershipParams): void {
    const { caller, newOwner } = this.execute('transferOwnership', params.caller, (state) => {
      const request = parseInput(TransferOwnershipRequestSchema, params);
      accessControl.transferOwnership(state, request.caller, request.newOwner);
      return request;
    });
    this.logger.info({ previousOwner: caller, newOwner }, 'Ownership transferred');
  }

  /**
   * @throws {UnauthorizedError} If the caller is not the owner
   */
  setMintAgent(params: SetMintAgentParams): void {
    const { caller, addr, enabled } = this.execute('setMintAgent', params.caller, (state) => {
      const request = parseInput(SetMintAgentRequestSchema, params);
      accessControl.setMintAgent(state, request.caller, request.addr, request.enabled);
      return request;
    });
    this.logger.info({ caller, addr, enabled }, 'Mint agent changed');
  }

  /**
   * Run one operation as a single all-or-nothing transaction
   * Notifications reach subscribers only after the commit.
   */
  private execute<T>(op: string, caller: string, operation: (state: LedgerState) => T): T {
    let outcome: TransactionOutcome<T>;
    try {
      outcome = this.repository.transaction(operation);
    } catch (error) {
      if (isLedgerError(error)) {
        this.logger.warn({ op, caller, code: error.code, err: error }, 'Ledger operation rejected');
      } else {
        this.logger.error({ op, caller, err: error }, 'Ledger operation failed');
      }
      throw error;
    }

    this.logger.debug({ op, caller, events: outcome.events.length }, 'Ledger operation committed');
    this.emitter.dispatch(outcome.events);
    return outcome.result;
  }
}
