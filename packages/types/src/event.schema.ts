/**
 * Ledger notification schemas
 *
 * Notifications are append-only records of committed state changes.
 * Monitors that receive them as JSON (amounts as decimal strings) can parse
 * them back with LedgerEventSchema.
 */

import { z } from 'zod';
import { AccountSchema, AmountSchema } from './account.schema.js';

const sequence = z.number().int().positive();

export const TransferEventSchema = z.object({
  type: z.literal('Transfer'),
  sequence,
  from: AccountSchema,
  to: AccountSchema,
  value: AmountSchema,
});

export const ApprovalEventSchema = z.object({
  type: z.literal('Approval'),
  sequence,
  owner: AccountSchema,
  spender: AccountSchema,
  value: AmountSchema,
});

export const MintEventSchema = z.object({
  type: z.literal('Mint'),
  sequence,
  to: AccountSchema,
  amount: AmountSchema,
});

export const BurnEventSchema = z.object({
  type: z.literal('Burn'),
  sequence,
  burner: AccountSchema,
  amount: AmountSchema,
});

export const MintAgentChangedEventSchema = z.object({
  type: z.literal('MintAgentChanged'),
  sequence,
  addr: AccountSchema,
  enabled: z.boolean(),
});

export const LedgerEventSchema = z.discriminatedUnion('type', [
  TransferEventSchema,
  ApprovalEventSchema,
  MintEventSchema,
  BurnEventSchema,
  MintAgentChangedEventSchema,
]);

export const LEDGER_EVENT_TYPES = [
  'Transfer',
  'Approval',
  'Mint',
  'Burn',
  'MintAgentChanged',
] as const;

export type LedgerEventType = (typeof LEDGER_EVENT_TYPES)[number];

export type TransferEvent = z.output<typeof TransferEventSchema>;
export type ApprovalEvent = z.output<typeof ApprovalEventSchema>;
export type MintEvent = z.output<typeof MintEventSchema>;
export type BurnEvent = z.output<typeof BurnEventSchema>;
export type MintAgentChangedEvent = z.output<typeof MintAgentChangedEventSchema>;
export type LedgerEvent = z.output<typeof LedgerEventSchema>;
