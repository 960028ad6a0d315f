/**
 * @mintable/types
 *
 * Shared zod schemas and inferred types for the mintable ledger.
 */

export * from './account.schema.js';
export * from './ledger.schema.js';
export * from './event.schema.js';
export * from './config.schema.js';
