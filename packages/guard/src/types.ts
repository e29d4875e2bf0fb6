import type { AntiWhaleConfig } from '@reflex/shared';

export type WhaleCheckInput = {
  grossAmount: bigint;
  netAmount: bigint;
  /** Recipient's balance before the transfer */
  recipientBalance: bigint;
  /** Supply before the transfer */
  totalSupply: bigint;
  /** Tax-exempt parties bypass both caps */
  exempt: boolean;
};

export type WhaleLimits = {
  /** null when the cap is disabled (fraction >= 1) */
  maxTransaction: bigint | null;
  maxWallet: bigint | null;
};

export type WhaleGuard = {
  readonly config: AntiWhaleConfig;
  check(input: WhaleCheckInput): void;
  limits(totalSupply: bigint): WhaleLimits;
};
