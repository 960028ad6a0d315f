import { z } from 'zod';
import { AmountSchema } from './account.schema.js';

/**
 * Construction-time ledger configuration
 * - name/symbol: display metadata only
 * - decimals: 0-77 (10^78 no longer fits in 256 bits)
 * - initialSupply: whole units, scaled by 10^decimals at construction
 */
export const LedgerConfigSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Ledger name is required')
    .max(64, 'Ledger name must be 64 characters or less')
    .default('Mintable Token'),
  symbol: z
    .string()
    .trim()
    .min(1, 'Ledger symbol is required')
    .max(11, 'Ledger symbol must be 11 characters or less')
    .default('MINT'),
  decimals: z.coerce
    .number()
    .int('Decimals must be a whole number')
    .min(0, 'Decimals cannot be negative')
    .max(77, 'Decimals cannot exceed 77')
    .default(18),
  initialSupply: AmountSchema.default('1000000'),
});

export type LedgerConfig = z.output<typeof LedgerConfigSchema>;
export type LedgerConfigInput = z.input<typeof LedgerConfigSchema>;
