import pino from 'pino';

import { NO_WHALE_LIMITS } from '@reflex/guard';
import { Host } from '@reflex/ledger';
import { isLedgerError, type AntiWhaleConfig, type Genesis, type TaxRates } from '@reflex/shared';

import { deployToken } from '../src/deploy';

export const TOKEN = '0x00000000000000000000000000000000000000f0';
export const TREASURY = '0x00000000000000000000000000000000000000e5';
export const ADMIN = '0x00000000000000000000000000000000000000aa';
export const MINTER = '0x00000000000000000000000000000000000000ab';
export const A = '0x00000000000000000000000000000000000000a1';
export const B = '0x00000000000000000000000000000000000000b2';
export const C = '0x00000000000000000000000000000000000000c3';
export const SPENDER = '0x00000000000000000000000000000000000000d1';
export const RECEIVER = '0x00000000000000000000000000000000000000d2';

export const TEN_PERCENT: TaxRates = { burnBps: 200, reflectBps: 500, treasuryBps: 300 };

export const silentLogger = pino({ level: 'silent' });

export function genesis(overrides: Partial<Genesis> = {}): Genesis {
  return {
    admin: ADMIN,
    minter: MINTER,
    cap: null,
    treasury: null,
    initialBalances: [
      { address: A, amount: 600_000n },
      { address: B, amount: 400_000n },
    ],
    taxExempt: [],
    reflectionExcluded: [],
    ...overrides,
  };
}

export function deploy(
  options: {
    genesis?: Genesis;
    taxRates?: TaxRates;
    antiWhale?: AntiWhaleConfig;
    withTreasury?: boolean;
    host?: Host;
  } = {},
) {
  const host = options.host ?? new Host({ logger: silentLogger });
  const { token, treasury } = deployToken({
    host,
    token: TOKEN,
    treasury: options.withTreasury === false ? undefined : TREASURY,
    info: { name: 'Reflex', symbol: 'RFX', decimals: 6 },
    taxRates: options.taxRates ?? TEN_PERCENT,
    antiWhale: options.antiWhale ?? NO_WHALE_LIMITS,
    genesis: options.genesis ?? genesis(),
    logger: silentLogger,
    checkInvariants: true,
  });
  return { host, token, treasury };
}

export function errorOf(fn: () => unknown): { code: string; message: string } | null {
  try {
    fn();
    return null;
  } catch (err) {
    if (isLedgerError(err)) return { code: err.code, message: err.message };
    return { code: 'NOT_LEDGER_ERROR', message: err instanceof Error ? err.message : String(err) };
  }
}
