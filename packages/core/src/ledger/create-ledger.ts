import {
  AccountSchema,
  LedgerConfigSchema,
  NULL_ACCOUNT,
  type LedgerConfigInput,
} from '@mintable/types';
import { logger as defaultLogger, type Logger } from '@mintable/observability';
import { add, mul, pow10 } from '../math/safe-math.js';
import { InvalidArgumentError } from './ledger-errors.js';
import { loadLedgerConfig } from './ledger-config.js';
import { LedgerEventEmitter } from './ledger-events.js';
import { LedgerRepository } from './ledger-repository.js';
import { LedgerService } from './ledger-service.js';
import { parseInput } from './validation.js';

export interface CreateLedgerParams {
  /** Receives the initial supply; becomes owner and first mint agent */
  creator: string;
  /** Defaults to loadLedgerConfig() */
  config?: LedgerConfigInput;
  logger?: Logger;
}

/**
 * Build a ledger with the full initial supply credited to the creator
 *
 * The genesis credit is recorded as Transfer(null → creator) so that the
 * notification journal alone accounts for every unit in circulation.
 *
 * @throws {InvalidArgumentError} If the creator or config is invalid
 * @throws {ArithmeticOverflowError} If initialSupply * 10^decimals exceeds 2^256 - 1
 */
export function createLedger(params: CreateLedgerParams): LedgerService {
  const log = params.logger ?? defaultLogger;
  const creator = parseInput(AccountSchema, params.creator);
  if (creator === NULL_ACCOUNT) {
    throw new InvalidArgumentError('Creator must not be the null account');
  }

  const config = params.config
    ? parseInput(LedgerConfigSchema, params.config)
    : loadLedgerConfig();
  const initialSupply = mul(config.initialSupply, pow10(config.decimals));

  const repository = new LedgerRepository(
    { name: config.name, symbol: config.symbol, decimals: config.decimals },
    creator
  );
  repository.transaction((state) => {
    state.setTotalSupply(add(state.getTotalSupply(), initialSupply));
    state.setBalance(creator, add(state.getBalance(creator), initialSupply));
    state.record({ type: 'Transfer', from: NULL_ACCOUNT, to: creator, value: initialSupply });
  });

  log.info(
    { name: config.name, symbol: config.symbol, decimals: config.decimals, creator, initialSupply },
    'Ledger created'
  );

  return new LedgerService(repository, new LedgerEventEmitter(log), log);
}
