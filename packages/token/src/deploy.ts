import type { Logger } from 'pino';

import type { Address, Host } from '@reflex/ledger';
import type { AntiWhaleConfig, Genesis, TaxRates } from '@reflex/shared';
import { TreasuryAccount } from '@reflex/treasury';

import { TaxedToken } from './token';
import type { TokenInfo } from './types';

export type DeployOptions = {
  host: Host;
  token: Address;
  /** Deploys a treasury contract at this address and points the token at it. */
  treasury?: Address;
  info: TokenInfo;
  taxRates: TaxRates;
  antiWhale: AntiWhaleConfig;
  genesis: Genesis;
  logger?: Logger;
  checkInvariants?: boolean;
};

export type Deployment = {
  token: TaxedToken;
  treasury: TreasuryAccount | null;
};

/** Registers the token (and optionally its treasury) and runs instantiation as the genesis admin. */
export function deployToken(options: DeployOptions): Deployment {
  const { host } = options;
  const token = host.register(
    new TaxedToken({ address: options.token, host, logger: options.logger, checkInvariants: options.checkInvariants }),
  );
  const treasury =
    options.treasury === undefined
      ? null
      : host.register(new TreasuryAccount({ address: options.treasury, admin: options.genesis.admin, token }));

  const genesis = treasury === null ? options.genesis : { ...options.genesis, treasury: treasury.address };
  host.execute(genesis.admin, token.address, 'instantiate', (ctx) =>
    token.instantiate(ctx, { ...options.info, taxRates: options.taxRates, antiWhale: options.antiWhale, genesis }),
  );

  return { token, treasury };
}
