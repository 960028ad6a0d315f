import { LedgerConfigSchema, type LedgerConfig } from '@mintable/types';

const ENV_KEYS = {
  name: 'LEDGER_NAME',
  symbol: 'LEDGER_SYMBOL',
  decimals: 'LEDGER_DECIMALS',
  initialSupply: 'LEDGER_INITIAL_SUPPLY',
} as const;

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function variableFor(field: unknown): string {
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    if (key === field) {
      return variable;
    }
  }
  return 'ledger configuration';
}

/**
 * Load construction-time configuration from the environment
 * Unset or blank variables fall back to the schema defaults.
 *
 * @throws Error naming the offending variable when a value is invalid
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = LedgerConfigSchema.safeParse({
    name: readEnv(env, ENV_KEYS.name),
    symbol: readEnv(env, ENV_KEYS.symbol),
    decimals: readEnv(env, ENV_KEYS.decimals),
    initialSupply: readEnv(env, ENV_KEYS.initialSupply),
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid ${variableFor(issue?.path[0])}: ${issue?.message ?? 'unknown error'}`, {
      cause: parsed.error,
    });
  }

  return parsed.data;
}
