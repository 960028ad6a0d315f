/**
 * @mintable/core - Domain logic for the mintable ledger
 *
 * Checked arithmetic plus the account ledger: balances, allowances,
 * supply changes and owner/mint-agent authorization.
 */

export * from './math/index.js';
export * from './ledger/index.js';
