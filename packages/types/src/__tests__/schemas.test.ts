import { describe, it, expect } from 'vitest';
import {
  AccountSchema,
  AmountSchema,
  LedgerConfigSchema,
  LedgerEventSchema,
  MAX_UINT256,
  NULL_ACCOUNT,
  SetMintAgentRequestSchema,
  TransferRequestSchema,
} from '../index.js';

const ALICE_MIXED = '0xAbCdEf0123456789aBcDeF0123456789AbCdEf01';
const ALICE = '0xabcdef0123456789abcdef0123456789abcdef01';
const BOB = `0x${'b'.repeat(40)}`;

describe('AccountSchema', () => {
  it('should lower-case valid identifiers', () => {
    expect(AccountSchema.parse(ALICE_MIXED)).toBe(ALICE);
  });

  it.each(['', '0x', 'abcdef0123456789abcdef0123456789abcdef01', `0x${'g'.repeat(40)}`, `${ALICE}0`])(
    'should reject %j',
    (input) => {
      const result = AccountSchema.safeParse(input);
      expect(result.success).toBe(false);
      expect(result.error?.issues[0]?.message).toBe('Account must be 0x followed by 40 hex digits');
    }
  );

  it('should expose the null account', () => {
    expect(NULL_ACCOUNT).toBe('0x0000000000000000000000000000000000000000');
  });
});

describe('AmountSchema', () => {
  it('should accept bigints, safe integers and digit strings', () => {
    expect(AmountSchema.parse(5n)).toBe(5n);
    expect(AmountSchema.parse(42)).toBe(42n);
    expect(AmountSchema.parse('1000000000000000000')).toBe(10n ** 18n);
    expect(AmountSchema.parse(MAX_UINT256.toString())).toBe(MAX_UINT256);
  });

  it('should reject negative amounts', () => {
    const result = AmountSchema.safeParse(-3n);
    expect(result.error?.issues[0]?.message).toBe('Amount must not be negative');
  });

  it('should reject amounts above 2^256 - 1', () => {
    const result = AmountSchema.safeParse(MAX_UINT256 + 1n);
    expect(result.error?.issues[0]?.message).toBe('Amount exceeds 2^256 - 1');
  });

  it('should reject fractional, unsafe and non-numeric input', () => {
    expect(AmountSchema.safeParse(1.5).success).toBe(false);
    expect(AmountSchema.safeParse(Number.MAX_SAFE_INTEGER + 1).success).toBe(false);
    expect(AmountSchema.safeParse('12.5').success).toBe(false);
    expect(AmountSchema.safeParse('-1').success).toBe(false);
    expect(AmountSchema.safeParse(null).success).toBe(false);
  });
});

describe('request schemas', () => {
  it('should normalize accounts and amounts in a transfer request', () => {
    expect(TransferRequestSchema.parse({ caller: ALICE_MIXED, to: BOB, value: '7' })).toEqual({
      caller: ALICE,
      to: BOB,
      value: 7n,
    });
  });

  it('should require an explicit enabled flag', () => {
    const result = SetMintAgentRequestSchema.safeParse({ caller: ALICE, addr: BOB });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['enabled']);
  });
});

describe('LedgerEventSchema', () => {
  it('should parse notifications whose amounts travelled as strings', () => {
    const event = LedgerEventSchema.parse({
      type: 'Transfer',
      sequence: 3,
      from: ALICE,
      to: BOB,
      value: '250',
    });

    expect(event).toEqual({ type: 'Transfer', sequence: 3, from: ALICE, to: BOB, value: 250n });
  });

  it('should reject unknown event types and non-positive sequences', () => {
    expect(
      LedgerEventSchema.safeParse({ type: 'Freeze', sequence: 1, addr: ALICE }).success
    ).toBe(false);
    expect(
      LedgerEventSchema.safeParse({ type: 'Mint', sequence: 0, to: ALICE, amount: 1n }).success
    ).toBe(false);
  });
});

describe('LedgerConfigSchema', () => {
  it('should apply defaults', () => {
    expect(LedgerConfigSchema.parse({})).toEqual({
      name: 'Mintable Token',
      symbol: 'MINT',
      decimals: 18,
      initialSupply: 1_000_000n,
    });
  });

  it('should trim names and coerce decimals', () => {
    expect(LedgerConfigSchema.parse({ name: '  Gold  ', decimals: '8' })).toMatchObject({
      name: 'Gold',
      decimals: 8,
    });
  });

  it('should bound decimals and symbol length', () => {
    expect(LedgerConfigSchema.safeParse({ decimals: 78 }).error?.issues[0]?.message).toBe(
      'Decimals cannot exceed 77'
    );
    expect(LedgerConfigSchema.safeParse({ symbol: 'ABCDEFGHIJKL' }).error?.issues[0]?.message).toBe(
      'Ledger symbol must be 11 characters or less'
    );
  });
});
