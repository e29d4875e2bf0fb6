import { z } from 'zod';

import { AddressSchema, BpsSchema, FractionStringSchema, type AntiWhaleConfig, type TaxRates } from '@reflex/shared';

const BooleanFlag = z.preprocess((v) => {
  if (typeof v === 'string') {
    const s = v.trim().toLowerCase();
    return s === '1' || s === 'true' || s === 'yes' || s === 'on';
  }
  return v;
}, z.boolean());

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3001),

  // Observability
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  METRICS_ENABLED: BooleanFlag.default(true),

  // Transfer tax, basis points of the gross amount
  TAX_BURN_BPS: z.coerce.number().pipe(BpsSchema).default(200),
  TAX_REFLECT_BPS: z.coerce.number().pipe(BpsSchema).default(500),
  TAX_TREASURY_BPS: z.coerce.number().pipe(BpsSchema).default(300),

  // Anti-whale caps as fractions of total supply; "1" disables a cap
  MAX_TRANSACTION_FRACTION: FractionStringSchema.default('1/100'),
  MAX_WALLET_FRACTION: FractionStringSchema.default('2/100'),

  // Token identity and deployment
  TOKEN_NAME: z.string().min(1).default('Reflex'),
  TOKEN_SYMBOL: z.string().min(1).max(12).default('RFX'),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  TOKEN_ADDRESS: AddressSchema.default('0x0000000000000000000000000000000000001000'),
  GENESIS_PATH: z.string().default('./genesis.json'),
});

export type Env = z.infer<typeof EnvSchema>;

export type AppConfig = {
  nodeEnv: Env['NODE_ENV'];
  host: string;
  port: number;
  logLevel: NonNullable<Env['LOG_LEVEL']>;
  metrics: {
    enabled: boolean;
  };
  taxRates: TaxRates;
  antiWhale: AntiWhaleConfig;
  token: {
    name: string;
    symbol: string;
    decimals: number;
    address: string;
  };
  genesisPath: string;
};

export function loadEnv(input: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(input);
}

export function loadConfig(input: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = loadEnv(input);
  return {
    nodeEnv: env.NODE_ENV,
    host: env.HOST,
    port: env.PORT,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : env.NODE_ENV === 'test' ? 'silent' : 'debug'),
    metrics: {
      enabled: env.METRICS_ENABLED,
    },
    taxRates: {
      burnBps: env.TAX_BURN_BPS,
      reflectBps: env.TAX_REFLECT_BPS,
      treasuryBps: env.TAX_TREASURY_BPS,
    },
    antiWhale: {
      maxTransaction: env.MAX_TRANSACTION_FRACTION,
      maxWallet: env.MAX_WALLET_FRACTION,
    },
    token: {
      name: env.TOKEN_NAME,
      symbol: env.TOKEN_SYMBOL,
      decimals: env.TOKEN_DECIMALS,
      address: env.TOKEN_ADDRESS,
    },
    genesisPath: env.GENESIS_PATH.trim(),
  };
}
