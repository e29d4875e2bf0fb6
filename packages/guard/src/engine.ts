import {
  AntiWhaleConfigSchema,
  LedgerError,
  invalidConfig,
  mulDivFloor,
  type AntiWhaleConfig,
  type Fraction,
} from '@reflex/shared';

import type { WhaleCheckInput, WhaleGuard, WhaleLimits } from './types';

/** Both caps disabled. */
export const NO_WHALE_LIMITS: AntiWhaleConfig = {
  maxTransaction: { numerator: 1n, denominator: 1n },
  maxWallet: { numerator: 1n, denominator: 1n },
};

function isDisabled(fraction: Fraction): boolean {
  return fraction.numerator >= fraction.denominator;
}

function capOf(totalSupply: bigint, fraction: Fraction): bigint | null {
  if (isDisabled(fraction)) return null;
  return mulDivFloor(totalSupply, fraction.numerator, fraction.denominator, 'u128');
}

export function validateAntiWhaleConfig(config: AntiWhaleConfig): AntiWhaleConfig {
  const parsed = AntiWhaleConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw invalidConfig('invalid_whale_fraction', {
      limit: String(issue?.path[0] ?? 'unknown'),
      reason: issue?.message ?? 'invalid',
    });
  }
  return parsed.data;
}

export function createWhaleGuard(config: AntiWhaleConfig): WhaleGuard {
  validateAntiWhaleConfig(config);

  return {
    config,

    limits(totalSupply: bigint): WhaleLimits {
      return {
        maxTransaction: capOf(totalSupply, config.maxTransaction),
        maxWallet: capOf(totalSupply, config.maxWallet),
      };
    },

    check(input: WhaleCheckInput): void {
      if (input.exempt) return;

      const { maxTransaction, maxWallet } = this.limits(input.totalSupply);

      if (maxTransaction !== null && input.grossAmount > maxTransaction) {
        throw new LedgerError({
          code: 'WHALE_LIMIT_EXCEEDED',
          message: 'max_transaction_exceeded',
          details: { amount: input.grossAmount.toString(), limit: maxTransaction.toString() },
        });
      }

      if (maxWallet !== null && input.recipientBalance + input.netAmount > maxWallet) {
        throw new LedgerError({
          code: 'WHALE_LIMIT_EXCEEDED',
          message: 'max_wallet_exceeded',
          details: {
            balanceAfter: (input.recipientBalance + input.netAmount).toString(),
            limit: maxWallet.toString(),
          },
        });
      }
    },
  };
}
