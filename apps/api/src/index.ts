import { loadConfig, loadGenesis } from '@reflex/config';

import { bootChain } from './chain';
import { getLogger, initLogger, logError } from './obs/logger';
import { createServer } from './server';

async function main() {
  const config = loadConfig(process.env);
  const logger = initLogger({ environment: config.nodeEnv, level: config.logLevel });

  const genesis = await loadGenesis(config.genesisPath);
  const chain = bootChain({ config, genesis, logger: logger.child({ component: 'chain' }) });

  const app = createServer({ config, chain });
  await app.listen({ port: config.port, host: config.host });
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logError(getLogger(), err, { phase: 'startup' });
  process.exitCode = 1;
});
