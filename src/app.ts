import { Hono } from 'hono';
import { logger as accessLogger } from 'hono/logger';
import type { Logger } from 'pino';
import type { AppConfig } from './config';
import { createStakingRoutes } from './routes/staking';
import { InMemoryAssetLedger, StakingEngine, type Clock } from './staking';

export interface AppDeps {
  engine: StakingEngine;
  logger: Logger;
}

/**
 * Engine over the in-memory asset ledger, seeded with the configured
 * opening balances. A deployment swaps in its token ledger client.
 */
export function createEngine(
  config: AppConfig,
  logger: Logger,
  clock?: Clock
): { engine: StakingEngine; assets: InMemoryAssetLedger } {
  const assets = new InMemoryAssetLedger(config.custody);
  for (const [account, amount] of config.genesisBalances) {
    assets.credit(account, amount);
  }

  const engine = new StakingEngine({
    owner: config.owner,
    custody: config.custody,
    transfer: assets,
    clock,
    cooldownPeriod: config.cooldownPeriod,
    maxEventHistory: config.eventHistoryLimit,
    logger: logger.child({ module: 'staking-engine' }),
  });

  return { engine, assets };
}

export function createApp({ engine, logger }: AppDeps): Hono {
  const app = new Hono();

  app.use('*', accessLogger((message) => logger.info(message)));

  app.get('/health', (c) => c.json({ success: true, status: 'ok' }));
  app.route('/staking', createStakingRoutes(engine));

  app.notFound((c) => c.json({ success: false, error: 'Not found' }, 404));
  app.onError((error, c) => {
    logger.error({ err: error }, 'Unhandled request error');
    return c.json({ success: false, error: 'Internal server error' }, 500);
  });

  return app;
}
