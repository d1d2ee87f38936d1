import 'dotenv/config';
import { z } from 'zod';
import { publicKeySchema } from './principal';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// JSON object of public key -> decimal amount, e.g. {"<key>":"1000"}
const genesisBalancesSchema = z
  .string()
  .default('{}')
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(z.record(publicKeySchema, z.string().regex(/^\d+$/, 'Must be a decimal amount')))
  .transform((balances) =>
    Object.entries(balances).map(([account, amount]): [string, bigint] => [account, BigInt(amount)])
  );

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  STAKING_OWNER: publicKeySchema,
  STAKING_CUSTODY: publicKeySchema.optional(),
  DEPOSIT_COOLDOWN_SECONDS: z.coerce.number().int().nonnegative().default(24 * 60 * 60),
  EVENT_HISTORY_LIMIT: z.coerce.number().int().positive().default(1000),
  GENESIS_BALANCES: genesisBalancesSchema,
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: string;
  owner: string;
  custody: string;
  cooldownPeriod: number;
  eventHistoryLimit: number;
  genesisBalances: Array<[string, bigint]>;   // Opening balances of the in-memory asset ledger
  isDev: boolean;
  isProd: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${fields}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    owner: data.STAKING_OWNER,
    custody: data.STAKING_CUSTODY ?? data.STAKING_OWNER,
    cooldownPeriod: data.DEPOSIT_COOLDOWN_SECONDS,
    eventHistoryLimit: data.EVENT_HISTORY_LIMIT,
    genesisBalances: data.GENESIS_BALANCES,
    isDev: data.NODE_ENV === 'development',
    isProd: data.NODE_ENV === 'production',
  };
}
