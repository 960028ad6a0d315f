/**
 * Ledger operation request schemas
 *
 * Every mutating operation names its caller explicitly. The caller is the
 * identity the surrounding authentication layer has already verified.
 */

import { z } from 'zod';
import { AccountSchema, AmountSchema } from './account.schema.js';

export const BalanceQuerySchema = z.object({
  account: AccountSchema,
});

export const AllowanceQuerySchema = z.object({
  owner: AccountSchema,
  spender: AccountSchema,
});

export const TransferRequestSchema = z.object({
  caller: AccountSchema,
  to: AccountSchema,
  value: AmountSchema,
});

export const TransferFromRequestSchema = z.object({
  caller: AccountSchema,
  from: AccountSchema,
  to: AccountSchema,
  value: AmountSchema,
});

export const ApproveRequestSchema = z.object({
  caller: AccountSchema,
  spender: AccountSchema,
  value: AmountSchema,
});

export const IncreaseApprovalRequestSchema = z.object({
  caller: AccountSchema,
  spender: AccountSchema,
  addedValue: AmountSchema,
});

export const DecreaseApprovalRequestSchema = z.object({
  caller: AccountSchema,
  spender: AccountSchema,
  subtractedValue: AmountSchema,
});

export const MintRequestSchema = z.object({
  caller: AccountSchema,
  amount: AmountSchema,
});

export const BurnFromRequestSchema = z.object({
  caller: AccountSchema,
  from: AccountSchema,
  amount: AmountSchema,
});

export const BurnSelfRequestSchema = z.object({
  caller: AccountSchema,
  amount: AmountSchema,
});

export const TransferOwnershipRequestSchema = z.object({
  caller: AccountSchema,
  newOwner: AccountSchema,
});

export const SetMintAgentRequestSchema = z.object({
  caller: AccountSchema,
  addr: AccountSchema,
  enabled: z.boolean(),
});

// Parsed shapes (branded accounts, bigint amounts)
export type TransferRequest = z.output<typeof TransferRequestSchema>;
export type TransferFromRequest = z.output<typeof TransferFromRequestSchema>;
export type ApproveRequest = z.output<typeof ApproveRequestSchema>;
export type IncreaseApprovalRequest = z.output<typeof IncreaseApprovalRequestSchema>;
export type DecreaseApprovalRequest = z.output<typeof DecreaseApprovalRequestSchema>;
export type MintRequest = z.output<typeof MintRequestSchema>;
export type BurnFromRequest = z.output<typeof BurnFromRequestSchema>;
export type BurnSelfRequest = z.output<typeof BurnSelfRequestSchema>;
export type TransferOwnershipRequest = z.output<typeof TransferOwnershipRequestSchema>;
export type SetMintAgentRequest = z.output<typeof SetMintAgentRequestSchema>;

// Shapes callers pass in (plain strings, numbers or bigints)
export type TransferParams = z.input<typeof TransferRequestSchema>;
export type TransferFromParams = z.input<typeof TransferFromRequestSchema>;
export type ApproveParams = z.input<typeof ApproveRequestSchema>;
export type IncreaseApprovalParams = z.input<typeof IncreaseApprovalRequestSchema>;
export type DecreaseApprovalParams = z.input<typeof DecreaseApprovalRequestSchema>;
export type MintParams = z.input<typeof MintRequestSchema>;
export type BurnFromParams = z.input<typeof BurnFromRequestSchema>;
export type BurnSelfParams = z.input<typeof BurnSelfRequestSchema>;
export type TransferOwnershipParams = z.input<typeof TransferOwnershipRequestSchema>;
export type SetMintAgentParams = z.input<typeof SetMintAgentRequestSchema>;
