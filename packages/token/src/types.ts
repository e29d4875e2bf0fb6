import type { Address, AllowanceEntry, Expiration } from '@reflex/ledger';
import type { AntiWhaleConfig, Genesis, TaxRates } from '@reflex/shared';

export type TokenInfo = {
  name: string;
  symbol: string;
  decimals: number;
};

/** Mutable contract settings, staged alongside the ledger. */
export type TokenConfig = {
  admin: Address;
  minter: Address | null;
  /** Upper bound on totalSupply for mints; null for uncapped */
  cap: bigint | null;
  treasury: Address | null;
  taxRates: TaxRates;
  antiWhale: AntiWhaleConfig;
};

export type InstantiateMsg = TokenInfo & {
  taxRates: TaxRates;
  antiWhale: AntiWhaleConfig;
  genesis: Genesis;
};

export type TransferAction = 'transfer' | 'send' | 'transfer_from' | 'send_from';

export type TransferEvent = {
  type: 'transfer';
  contract: Address;
  action: TransferAction;
  from: Address;
  to: Address;
  /** Caller; differs from `from` for allowance variants */
  by: Address;
  gross: bigint;
  net: bigint;
  burn: bigint;
  reflect: bigint;
  treasury: bigint;
};

export type BurnEvent = {
  type: 'burn';
  contract: Address;
  from: Address;
  by: Address;
  amount: bigint;
};

export type MintEvent = {
  type: 'mint';
  contract: Address;
  to: Address;
  amount: bigint;
};

export type AllowanceEvent = {
  type: 'allowance';
  contract: Address;
  owner: Address;
  spender: Address;
  amount: bigint;
  expires: Expiration;
};

export type ConfigEvent = {
  type: 'config';
  contract: Address;
  action:
    | 'set_tax_rates'
    | 'set_tax_exempt'
    | 'set_reflection_excluded'
    | 'set_anti_whale'
    | 'set_treasury'
    | 'transfer_admin';
  target?: Address;
};

/** Ascending by address; `startAfter` is exclusive. */
export type PageOptions = {
  startAfter?: Address;
  limit?: number;
};

export type SpenderAllowance = AllowanceEntry & {
  spender: Address;
};
