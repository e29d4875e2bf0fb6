import type { Logger } from 'pino';

import type { AppConfig } from '@reflex/config';
import { Host } from '@reflex/ledger';
import type { Genesis } from '@reflex/shared';
import { deployToken, type Deployment } from '@reflex/token';

export type Chain = Deployment & {
  host: Host;
};

/** In-process host with the token (and its treasury, when genesis names one) deployed. */
export function bootChain(params: { config: AppConfig; genesis: Genesis; logger?: Logger }): Chain {
  const { config, genesis, logger } = params;
  const host = new Host({ logger });
  const deployment = deployToken({
    host,
    token: config.token.address,
    treasury: genesis.treasury ?? undefined,
    info: { name: config.token.name, symbol: config.token.symbol, decimals: config.token.decimals },
    taxRates: config.taxRates,
    antiWhale: config.antiWhale,
    genesis,
    logger,
  });
  return { host, ...deployment };
}
